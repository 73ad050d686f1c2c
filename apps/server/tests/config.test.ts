import { describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config';

describe('loadConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.port).toBe(3000);
    expect(config.nodeEnv).toBe('development');
    expect(config.databaseUrl).toBe('file:./data/dev.db');
    expect(config.apiAuthToken).toBeNull();
    expect(config.media).toEqual({ dir: 'temp_images', publicBaseUrl: 'http://localhost:3000' });
    expect(config.tiktok.apiUrl).toBe('http://127.0.0.1:8001');
    expect(config.whatsapp.apiUrl).toBe('https://gate.whapi.cloud');
    expect(config.publishing).toMatchObject({
      maxAttempts: 3,
      retryDelayMs: 60_000,
      taskTimeLimitMs: 300_000,
      workerConcurrency: 4,
      runWorker: true,
    });
  });

  it('reads overrides and ignores invalid numbers', () => {
    const config = loadConfig({
      PORT: '8080',
      PUBLISH_MAX_ATTEMPTS: 'three',
      PUBLISH_RETRY_DELAY_MS: '5000',
      RUN_PUBLISH_WORKER: 'false',
      TIKTOK_API_URL: 'http://tiktok-backend:9000/',
    });

    expect(config.port).toBe(8080);
    expect(config.media.publicBaseUrl).toBe('http://localhost:8080');
    expect(config.publishing.maxAttempts).toBe(3);
    expect(config.publishing.retryDelayMs).toBe(5000);
    expect(config.publishing.runWorker).toBe(false);
    expect(config.tiktok.apiUrl).toBe('http://tiktok-backend:9000');
  });

  it('uses the page token for instagram unless one is given', () => {
    expect(loadConfig({ FACEBOOK_PAGE_ACCESS_TOKEN: 'page-token' }).meta.instagramAccessToken).toBe('page-token');
    expect(
      loadConfig({ FACEBOOK_PAGE_ACCESS_TOKEN: 'page-token', INSTAGRAM_ACCESS_TOKEN: 'ig-token' }).meta
        .instagramAccessToken,
    ).toBe('ig-token');
  });
});
