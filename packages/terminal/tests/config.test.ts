import { ConfigError } from '@marketshell/market-data';
import { describe, it, expect } from 'vitest';
import { loadTerminalConfig } from '../src/config.js';

describe('loadTerminalConfig', () => {
  it('applies defaults', () => {
    const config = loadTerminalConfig({}, false);

    expect(config).toEqual({
      marketData: {
        finnhubApiKey: undefined,
        finbrainApiKey: undefined,
        ethGasStationApiKey: undefined,
        timeoutMs: 10_000,
        rateLimit: 120,
        cacheTtl: 300,
      },
      useColor: false,
      plot: true,
      exportDir: 'exports',
      chartDir: 'charts',
      logLevel: 'warn',
    });
  });

  it('follows the terminal when colour is not set', () => {
    expect(loadTerminalConfig({}, true).useColor).toBe(true);
    expect(loadTerminalConfig({ MARKETSHELL_USE_COLOR: 'no' }, true).useColor).toBe(false);
    expect(loadTerminalConfig({ MARKETSHELL_USE_COLOR: 'On' }, false).useColor).toBe(true);
  });

  it('reads presentation settings', () => {
    const config = loadTerminalConfig({
      FINNHUB_API_KEY: 'test-secret',
      MARKETSHELL_PLOT: '0',
      MARKETSHELL_EXPORT_DIR: 'out',
      MARKETSHELL_CHART_DIR: 'img',
      MARKETSHELL_LOG_LEVEL: 'debug',
    });

    expect(config.marketData.finnhubApiKey).toBe('test-secret');
    expect(config.plot).toBe(false);
    expect(config.exportDir).toBe('out');
    expect(config.chartDir).toBe('img');
    expect(config.logLevel).toBe('debug');
  });

  it('collects every invalid variable into one error', () => {
    let error: unknown;
    try {
      loadTerminalConfig({ MARKETSHELL_RATE_LIMIT: 'abc', MARKETSHELL_PLOT: 'maybe' }, false);
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(ConfigError);
    const issues = error instanceof ConfigError ? error.issues : [];
    expect(issues).toHaveLength(2);
    expect(issues[0]?.startsWith('MARKETSHELL_RATE_LIMIT: ')).toBe(true);
    expect(issues[1]?.startsWith('MARKETSHELL_PLOT: ')).toBe(true);
  });
});
