import { describe, it, expect } from 'vitest';
import { ConfigError, loadMarketDataConfig } from '../src/config.js';

describe('loadMarketDataConfig', () => {
  it('applies defaults', () => {
    expect(loadMarketDataConfig({})).toEqual({
      finnhubApiKey: undefined,
      finbrainApiKey: undefined,
      ethGasStationApiKey: undefined,
      timeoutMs: 10_000,
      rateLimit: 120,
      cacheTtl: 300,
    });
  });

  it('reads keys and coerces numbers', () => {
    const config = loadMarketDataConfig({
      FINNHUB_API_KEY: 'test-secret',
      MARKETSHELL_HTTP_TIMEOUT_MS: '2500',
      MARKETSHELL_CACHE_TTL: '0',
    });
    expect(config.finnhubApiKey).toBe('test-secret');
    expect(config.timeoutMs).toBe(2500);
    expect(config.cacheTtl).toBe(0);
  });

  it('treats blank keys as unset', () => {
    expect(loadMarketDataConfig({ FINBRAIN_API_KEY: '   ' }).finbrainApiKey).toBeUndefined();
  });

  it('lists every invalid key in a ConfigError', () => {
    let error: unknown;
    try {
      loadMarketDataConfig({ MARKETSHELL_RATE_LIMIT: 'fast', MARKETSHELL_CACHE_TTL: '-1' });
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(ConfigError);
    const issues = error instanceof ConfigError ? error.issues : [];
    expect(issues.map(i => i.split(':')[0])).toEqual(['MARKETSHELL_RATE_LIMIT', 'MARKETSHELL_CACHE_TTL']);
  });
});
