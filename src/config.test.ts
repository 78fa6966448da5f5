import { describe, expect, it } from 'vitest';
import { loadConfig } from './config';
import { ConfigError } from './errors';

const MiB = 1024 * 1024;

describe('loadConfig', () => {
  it('applies defaults around a static token', () => {
    const config = loadConfig({ TIKTOK_ACCESS_TOKEN: 'test-token' });

    expect(config.staticAccessToken).toBe('test-token');
    expect(config.oauth).toBeUndefined();
    expect(config.port).toBe(3000);
    expect(config.dataFile).toBe('./data/db.json');
    expect(config.publish).toEqual({
      apiBase: 'https://open.tiktokapis.com',
      chunkSize: 10 * MiB,
      maxStatusPolls: 10,
      statusPollIntervalMs: 3000,
      requestTimeoutMs: 30_000,
      privacyLevel: 'SELF_ONLY',
    });
    expect(config.jwt).toEqual({ secret: undefined, expirationHours: 24 });
    expect(config.tokenRefreshMarginMs).toBe(60_000);
    expect(config.maxUploadBytes).toBe(64 * MiB);
  });

  it('builds the oauth block when the client is fully configured', () => {
    const config = loadConfig({
      TIKTOK_CLIENT_KEY: 'test-key',
      TIKTOK_CLIENT_SECRET: 'test-secret',
      TIKTOK_REDIRECT_URI: 'http://localhost:3000/auth/tiktok/callback',
      JWT_SECRET_KEY: 'test-jwt-secret',
      TIKTOK_API_BASE: 'http://localhost:9999/',
    });

    expect(config.oauth).toEqual({
      clientKey: 'test-key',
      clientSecret: 'test-secret',
      redirectUri: 'http://localhost:3000/auth/tiktok/callback',
      scope: 'user.info.basic,video.publish',
    });
    expect(config.staticAccessToken).toBeUndefined();
    expect(config.publish.apiBase).toBe('http://localhost:9999');
  });

  it('fails fast when no credential source is configured', () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({ TIKTOK_ACCESS_TOKEN: '   ' })).toThrow(/TIKTOK_ACCESS_TOKEN/);
  });

  it('names every missing oauth companion', () => {
    let message = '';
    try {
      loadConfig({ TIKTOK_CLIENT_KEY: 'test-key' });
    } catch (err) {
      message = err instanceof Error ? err.message : '';
    }
    expect(message).toContain('TIKTOK_CLIENT_SECRET');
    expect(message).toContain('TIKTOK_REDIRECT_URI');
    expect(message).toContain('JWT_SECRET_KEY');
  });

  it('rejects a chunk size outside the platform bounds', () => {
    expect(() => loadConfig({ TIKTOK_ACCESS_TOKEN: 'test-token', UPLOAD_CHUNK_SIZE: String(MiB) })).toThrow(/UPLOAD_CHUNK_SIZE/);
  });
});
