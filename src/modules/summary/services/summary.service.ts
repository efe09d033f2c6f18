import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { keccak512 } from 'js-sha3';
import { NoDataProvidedError } from '../../../common/errors/breach.errors';
import {
  ISummarizer,
  SUMMARIZER,
  SummaryPrompt,
} from '../../../common/interfaces/summarizer.interface';
import { CacheService } from '../../cache/cache.service';
import { BreachSummaryInput, buildSummaryPrompt } from '../summary.prompt';

@Injectable()
export class SummaryService {
  private readonly logger = new Logger(SummaryService.name);
  private readonly cacheTtl: number;

  constructor(
    @Inject(SUMMARIZER) private readonly summarizer: ISummarizer,
    private readonly cacheService: CacheService,
    configService: ConfigService,
  ) {
    this.cacheTtl = configService.getOrThrow<number>('app.summaryCacheTtl');
  }

  async summarize(matches: BreachSummaryInput[]): Promise<string> {
    if (!matches.length) {
      throw new NoDataProvidedError();
    }

    const prompt = buildSummaryPrompt(matches);
    const cacheKey = this.cacheKeyFor(prompt);
    const cached = await this.readCache(cacheKey);
    if (cached) {
      this.logger.debug(`Cache hit for ${cacheKey.slice(0, 18)}...`);
      return cached;
    }

    this.logger.log(`Summarizing ${matches.length} breaches`);
    const summary = await this.summarizer.summarize(prompt);
    await this.writeCache(cacheKey, summary);
    return summary;
  }

  private cacheKeyFor(prompt: SummaryPrompt): string {
    return `summary:${keccak512(`${prompt.system}\n${prompt.user}`)}`;
  }

  // A cache failure counts as a miss.
  private async readCache(key: string): Promise<string | null> {
    if (this.cacheTtl === 0) return null;
    try {
      return await this.cacheService.get<string>(key);
    } catch (error) {
      this.logger.warn(`Summary cache unavailable: ${(error as Error).message}`);
      return null;
    }
  }

  private async writeCache(key: string, summary: string): Promise<void> {
    if (this.cacheTtl === 0) return;
    try {
      await this.cacheService.set(key, summary, this.cacheTtl);
    } catch (error) {
      this.logger.warn(
        `Failed to cache summary: ${(error as Error).message}`,
      );
    }
  }
}
