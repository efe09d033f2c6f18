import { registerAs } from '@nestjs/config';
import Joi from 'joi';

export type CacheDriver = 'memory' | 'redis';

export interface AppConfig {
  port: number;
  corsOrigins: string[];
  corpusPath: string;
  checkDelayMs: number;
  googleApiKey?: string;
  geminiApiUrl: string;
  geminiModel: string;
  summaryTimeoutMs: number;
  summaryCacheTtl: number;
  cacheDriver: CacheDriver;
  redisHost: string;
  redisPort: number;
  redisPassword: string;
  redisTls: boolean;
  telegramBotToken?: string;
  mailFrom: string;
}

function toInt(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function buildAppConfig(env: NodeJS.ProcessEnv): AppConfig {
  return {
    port: toInt(env.PORT, 8000),
    corsOrigins: (env.CORS_ORIGINS || 'http://localhost:5173')
      .split(',')
      .map((origin) => origin.trim())
      .filter(Boolean),
    corpusPath: env.BREACH_CORPUS_PATH || 'data/breaches.json',
    checkDelayMs: toInt(env.CHECK_DELAY_MS, 1200),
    googleApiKey: env.GOOGLE_API_KEY || undefined,
    geminiApiUrl:
      env.GEMINI_API_URL ||
      'https://generativelanguage.googleapis.com/v1beta',
    geminiModel: env.GEMINI_MODEL || 'gemini-2.5-flash',
    summaryTimeoutMs: toInt(env.SUMMARY_TIMEOUT_MS, 30000),
    summaryCacheTtl: toInt(env.SUMMARY_CACHE_TTL, 24 * 60 * 60),
    cacheDriver: env.CACHE_DRIVER === 'redis' ? 'redis' : 'memory',
    redisHost: env.REDIS_HOST || 'localhost',
    redisPort: toInt(env.REDIS_PORT, 6379),
    redisPassword: env.REDIS_PASSWORD || '',
    redisTls: env.REDIS_TLS === 'true',
    telegramBotToken: env.TELEGRAM_BOT_TOKEN || undefined,
    mailFrom: env.MAIL_FROM || 'security@breach-check.local',
  };
}

export default registerAs('app', () => buildAppConfig(process.env));

export const configValidationSchema = Joi.object({
  PORT: Joi.number().port().default(8000),
  CORS_ORIGINS: Joi.string().default('http://localhost:5173'),
  BREACH_CORPUS_PATH: Joi.string().default('data/breaches.json'),
  CHECK_DELAY_MS: Joi.number().integer().min(0).default(1200),
  GOOGLE_API_KEY: Joi.string().allow('').optional(),
  GEMINI_API_URL: Joi.string().uri().optional(),
  GEMINI_MODEL: Joi.string().optional(),
  SUMMARY_TIMEOUT_MS: Joi.number().integer().min(1).default(30000),
  SUMMARY_CACHE_TTL: Joi.number().integer().min(0).default(86400),
  CACHE_DRIVER: Joi.string().valid('memory', 'redis').default('memory'),
  REDIS_HOST: Joi.string().default('localhost'),
  REDIS_PORT: Joi.number().default(6379),
  REDIS_PASSWORD: Joi.string().allow('').optional(),
  REDIS_TLS: Joi.string().valid('true', 'false').optional(),
  TELEGRAM_BOT_TOKEN: Joi.string().allow('').optional(),
  MAIL_FROM: Joi.string().email({ tlds: false }).optional(),
});
