import { INestApplication } from '@nestjs/common';
import { AppErrorFilter } from './common/filters/app-error.filter';
import { createValidationPipe } from './common/pipes/validation.pipe';

export function configureApp(app: INestApplication, corsOrigins: string[]): void {
  app.enableCors({
    origin: corsOrigins,
    credentials: true,
  });
  app.useGlobalPipes(createValidationPipe());
  app.useGlobalFilters(new AppErrorFilter());
}
