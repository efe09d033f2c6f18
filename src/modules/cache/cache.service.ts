import { Inject, Injectable, Logger } from '@nestjs/common';
import { AppError } from '../../common/errors/app.error';
import {
  CACHE_DRIVER,
  ICacheService,
} from '../../common/interfaces/cache.interface';

@Injectable()
export class CacheService {
  private readonly logger = new Logger(CacheService.name);

  constructor(@Inject(CACHE_DRIVER) private readonly cache: ICacheService) {}

  async get<T>(key: string): Promise<T | null> {
    try {
      return await this.cache.get<T>(key);
    } catch (error) {
      this.logger.warn(
        `Cache get failed for key ${key}: ${(error as Error).message}`,
      );
      throw new AppError(`Cache operation failed`, 500, 'CACHE_ERROR');
    }
  }

  async set<T>(key: string, value: T, ttl?: number): Promise<void> {
    try {
      await this.cache.set(key, value, ttl);
    } catch (error) {
      this.logger.warn(
        `Cache set failed for key ${key}: ${(error as Error).message}`,
      );
      throw new AppError(`Cache operation failed`, 500, 'CACHE_ERROR');
    }
  }
}
