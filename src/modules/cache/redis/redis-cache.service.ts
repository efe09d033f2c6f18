import { Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis, { RedisOptions } from 'ioredis';
import { ICacheService } from '../../../common/interfaces/cache.interface';

export class RedisCacheService
  implements ICacheService, OnModuleInit, OnModuleDestroy
{
  private readonly client: Redis;
  private readonly logger = new Logger(RedisCacheService.name);
  private isConnected = false;

  constructor(configService: ConfigService) {
    const redisConfig: RedisOptions = {
      host: configService.getOrThrow<string>('app.redisHost'),
      port: configService.getOrThrow<number>('app.redisPort'),
      password: configService.get<string>('app.redisPassword') || undefined,
      tls: configService.get<boolean>('app.redisTls') ? {} : undefined,
      retryStrategy: (times) => Math.min(times * 50, 2000),
      maxRetriesPerRequest: 3,
    };

    this.logger.log(
      `Connecting to Redis at ${redisConfig.host}:${redisConfig.port}`,
    );
    this.client = new Redis(redisConfig);
    this.setupEventListeners();
  }

  private setupEventListeners(): void {
    this.client.on('error', (err) => {
      this.logger.warn(`Redis error: ${err.message}`);
      this.isConnected = false;
    });
    this.client.on('ready', () => {
      this.logger.log('Redis is ready');
      this.isConnected = true;
    });
    this.client.on('close', () => {
      this.logger.warn('Redis connection closed');
      this.isConnected = false;
    });
  }

  async onModuleInit(): Promise<void> {
    try {
      await this.client.ping();
      this.logger.log('Redis ping successful');
    } catch (err) {
      this.logger.error(`Redis ping failed: ${(err as Error).message}`);
    }
  }

  async onModuleDestroy(): Promise<void> {
    try {
      await this.client.quit();
    } catch (err) {
      this.logger.warn(
        `Failed to close Redis connection: ${(err as Error).message}`,
      );
    }
  }

  private checkConnection(): void {
    if (!this.isConnected) {
      this.logger.warn('Redis is not connected. Operation may fail.');
    }
  }

  async get<T>(key: string): Promise<T | null> {
    this.checkConnection();
    const data = await this.client.get(key);
    return data ? JSON.parse(data) : null;
  }

  async set<T>(key: string, value: T, ttl?: number): Promise<void> {
    this.checkConnection();
    const stringValue = JSON.stringify(value);
    if (ttl) {
      await this.client.set(key, stringValue, 'EX', ttl);
    } else {
      await this.client.set(key, stringValue);
    }
  }
}
