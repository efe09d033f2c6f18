import { Body, Controller, HttpCode, Post } from '@nestjs/common';
import { SummarizeBreachDto } from './dto/summarize-breach.dto';
import { SummaryService } from './services/summary.service';

@Controller()
export class SummaryController {
  constructor(private readonly summaryService: SummaryService) {}

  @Post('summarize-breach')
  @HttpCode(200)
  async summarizeBreach(
    @Body() dto: SummarizeBreachDto,
  ): Promise<{ summary: string }> {
    const summary = await this.summaryService.summarize(dto.breach_data ?? []);
    return { summary };
  }
}
