import { Controller, Get } from '@nestjs/common';
import { BreachCheckService } from '../breach-check/services/breach-check.service';

@Controller()
export class HealthController {
  constructor(private readonly breachCheckService: BreachCheckService) {}

  @Get()
  status() {
    return {
      status: 'Breach check API is running',
      corpus_size: this.breachCheckService.corpusSize,
    };
  }
}
