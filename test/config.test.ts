import { describe, it, expect } from 'vitest';
import { loadConfig, parseGroupList } from '../src/config.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const cfg = loadConfig({});
    expect(cfg.PORT).toBe(3000);
    expect(cfg.MARKET_DATA_PROVIDER).toBe('polygon');
    expect(cfg.EXPIRY_MIN_DAYS).toBe(20);
    expect(cfg.EXPIRY_MAX_DAYS).toBe(40);
    expect(cfg.ITM_COUNT).toBe(2);
    expect(cfg.OTM_COUNT).toBe(5);
    expect(cfg.SCAN_CACHE_TTL_MS).toBe(900_000);
    expect(cfg.POLYGON_API_KEY).toBeUndefined();
  });

  it('coerces numbers and treats blank secrets as unset', () => {
    const cfg = loadConfig({ PORT: '8080', OTM_COUNT: '3', POLYGON_API_KEY: '  ', ALPACA_API_KEY: ' test-key ' });
    expect(cfg.PORT).toBe(8080);
    expect(cfg.OTM_COUNT).toBe(3);
    expect(cfg.POLYGON_API_KEY).toBeUndefined();
    expect(cfg.ALPACA_API_KEY).toBe('test-key');
  });

  it('rejects an inverted expiry window', () => {
    expect(() => loadConfig({ EXPIRY_MIN_DAYS: '45', EXPIRY_MAX_DAYS: '30' })).toThrow(
      'Invalid configuration:\n  EXPIRY_MAX_DAYS: must be greater than or equal to EXPIRY_MIN_DAYS',
    );
  });

  it('rejects an unknown provider', () => {
    expect(() => loadConfig({ MARKET_DATA_PROVIDER: 'yahoo' })).toThrow(/^Invalid configuration:\n {2}MARKET_DATA_PROVIDER: /);
  });
});

describe('parseGroupList', () => {
  it('splits, trims and upper-cases', () => {
    expect(parseGroupList(' btc, eth ,,sol ')).toEqual(['BTC', 'ETH', 'SOL']);
    expect(parseGroupList('')).toEqual([]);
  });
});
