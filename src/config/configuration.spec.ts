import { buildAppConfig, configValidationSchema } from './configuration';

describe('buildAppConfig', () => {
  it('applies defaults', () => {
    expect(buildAppConfig({})).toEqual({
      port: 8000,
      corsOrigins: ['http://localhost:5173'],
      corpusPath: 'data/breaches.json',
      checkDelayMs: 1200,
      googleApiKey: undefined,
      geminiApiUrl: 'https://generativelanguage.googleapis.com/v1beta',
      geminiModel: 'gemini-2.5-flash',
      summaryTimeoutMs: 30000,
      summaryCacheTtl: 86400,
      cacheDriver: 'memory',
      redisHost: 'localhost',
      redisPort: 6379,
      redisPassword: '',
      redisTls: false,
      telegramBotToken: undefined,
      mailFrom: 'security@breach-check.local',
    });
  });

  it('splits and trims CORS origins', () => {
    expect(
      buildAppConfig({ CORS_ORIGINS: 'http://a.test, http://b.test,' })
        .corsOrigins,
    ).toEqual(['http://a.test', 'http://b.test']);
  });

  it('reads numeric and boolean settings', () => {
    const config = buildAppConfig({
      PORT: '9000',
      CHECK_DELAY_MS: '0',
      CACHE_DRIVER: 'redis',
      REDIS_TLS: 'true',
      GOOGLE_API_KEY: 'test-key',
    });

    expect(config).toMatchObject({
      port: 9000,
      checkDelayMs: 0,
      cacheDriver: 'redis',
      redisTls: true,
      googleApiKey: 'test-key',
    });
  });

  it('treats an empty API key as missing', () => {
    expect(buildAppConfig({ GOOGLE_API_KEY: '' }).googleApiKey).toBeUndefined();
  });
});

describe('configValidationSchema', () => {
  it('accepts an empty environment', () => {
    expect(configValidationSchema.validate({}).error).toBeUndefined();
  });

  it('rejects an unknown cache driver', () => {
    expect(
      configValidationSchema.validate({ CACHE_DRIVER: 'memcached' }).error,
    ).toBeDefined();
  });

  it('rejects a negative delay', () => {
    expect(
      configValidationSchema.validate({ CHECK_DELAY_MS: '-1' }).error,
    ).toBeDefined();
  });
});
