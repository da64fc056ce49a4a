import { describe, it, expect } from 'vitest';
import { normalizeSymbol, withExchangeSuffix } from '../src/utils/symbols';
import { loadConfig, DEFAULT_REALTIME_BASE_URL } from '../src/utils/config';

describe('normalizeSymbol', () => {
  it('upper-cases and strips exchange suffixes', () => {
    expect(normalizeSymbol('tcs.ns')).toBe('TCS');
    expect(normalizeSymbol('RELIANCE.BO')).toBe('RELIANCE');
    expect(normalizeSymbol(' infy ')).toBe('INFY');
  });

  it('leaves bare symbols alone', () => {
    expect(normalizeSymbol('M&M')).toBe('M&M');
  });
});

describe('withExchangeSuffix', () => {
  it('appends the suffix to bare tickers only', () => {
    expect(withExchangeSuffix('TCS', '.NS')).toBe('TCS.NS');
    expect(withExchangeSuffix('TCS.BO', '.NS')).toBe('TCS.BO');
  });
});

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});
    expect(config).toEqual({
      port: 10000,
      nodeEnv: 'development',
      realtimeBaseUrl: DEFAULT_REALTIME_BASE_URL,
      eodhdApiKey: undefined,
      allowedOrigins: undefined,
    });
  });

  it('reads values from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      NODE_ENV: 'production',
      REALTIME_API_BASE_URL: 'https://isma.test/',
      EODHD_API_KEY: ' test-key ',
      ALLOWED_ORIGINS: 'http://a.test, http://b.test',
    });
    expect(config).toEqual({
      port: 8080,
      nodeEnv: 'production',
      realtimeBaseUrl: 'https://isma.test',
      eodhdApiKey: 'test-key',
      allowedOrigins: ['http://a.test', 'http://b.test'],
    });
  });

  it('treats an empty EODHD key as absent', () => {
    expect(loadConfig({ EODHD_API_KEY: '' }).eodhdApiKey).toBeUndefined();
  });
});
