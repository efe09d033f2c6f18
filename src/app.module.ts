import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import configuration, { configValidationSchema } from './config/configuration';
import { BreachCheckModule } from './modules/breach-check/breach-check.module';
import { HealthModule } from './modules/health/health.module';
import { SummaryModule } from './modules/summary/summary.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      validationSchema: configValidationSchema,
    }),
    BreachCheckModule,
    SummaryModule,
    HealthModule,
  ],
})
export class AppModule {}
