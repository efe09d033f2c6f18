import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  CACHE_DRIVER,
  ICacheService,
} from '../../common/interfaces/cache.interface';
import { CacheService } from './cache.service';
import { MemoryCacheService } from './memory/memory-cache.service';
import { RedisCacheService } from './redis/redis-cache.service';

@Module({
  providers: [
    {
      provide: CACHE_DRIVER,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): ICacheService =>
        configService.get<string>('app.cacheDriver') === 'redis'
          ? new RedisCacheService(configService)
          : new MemoryCacheService(),
    },
    CacheService,
  ],
  exports: [CacheService],
})
export class CacheModule {}
