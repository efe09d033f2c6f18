import { Module } from '@nestjs/common';
import { BreachCheckModule } from '../breach-check/breach-check.module';
import { HealthController } from './health.controller';

@Module({
  imports: [BreachCheckModule],
  controllers: [HealthController],
})
export class HealthModule {}
