import { HttpModule } from '@nestjs/axios';
import { Module } from '@nestjs/common';
import { SUMMARIZER } from '../../common/interfaces/summarizer.interface';
import { CacheModule } from '../cache/cache.module';
import { GeminiSummarizer } from './services/gemini-summarizer.service';
import { SummaryService } from './services/summary.service';
import { SummaryController } from './summary.controller';

@Module({
  imports: [HttpModule, CacheModule],
  controllers: [SummaryController],
  providers: [{ provide: SUMMARIZER, useClass: GeminiSummarizer }, SummaryService],
})
export class SummaryModule {}
