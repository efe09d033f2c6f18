import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const configService = app.get(ConfigService);

  configureApp(app, configService.getOrThrow<string[]>('app.corsOrigins'));
  app.enableShutdownHooks();

  const port = configService.getOrThrow<number>('app.port');
  await app.listen(port, '0.0.0.0');
  Logger.log(`Application is running on port ${port}`, 'Bootstrap');
}

void bootstrap();
