import { Body, Controller, HttpCode, Post } from '@nestjs/common';
import {
  toMatchResultPayload,
  toNotifyTarget,
} from './breach-check.presenter';
import { CheckBreachDto } from './dto/check-breach.dto';
import { BreachCheckService } from './services/breach-check.service';
import { MatchResultPayload } from './types/breach.types';

@Controller()
export class BreachCheckController {
  constructor(private readonly breachCheckService: BreachCheckService) {}

  @Post('check-breach-hash')
  @HttpCode(200)
  async checkBreachHash(
    @Body() dto: CheckBreachDto,
  ): Promise<MatchResultPayload> {
    const result = await this.breachCheckService.checkBreach(
      dto.hash,
      toNotifyTarget(dto),
    );
    return toMatchResultPayload(result);
  }
}
