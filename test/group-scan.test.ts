import { describe, it, expect, vi, beforeEach } from 'vitest';
import { scanGroup, sortByOpenInterest } from '../src/pipeline/group-scan.js';
import { mapWithConcurrency } from '../src/lib/concurrency.js';
import type { ScanOutcome } from '../src/types/scan.js';
import { FakeProvider, REFERENCE_DAY, TARGET_EXPIRATION, makeCall, scenarioTicker } from './helpers/fake-provider.js';

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
});

const success = (ticker: string, totalOpenInterest: number): ScanOutcome => ({
  status: 'success',
  ticker,
  currentPrice: 10,
  week52High: null,
  week52Low: null,
  expiration: TARGET_EXPIRATION,
  daysToExpiration: 25,
  strategies: [],
  totalOpenInterest,
});

const failure = (ticker: string): ScanOutcome => ({
  status: 'failure',
  ticker,
  reason: 'NoExpirations',
  message: `No options for ${ticker}.`,
});

describe('scanGroup', () => {
  it('keeps group order and isolates per-ticker failures', async () => {
    const provider = new FakeProvider({
      IBIT: scenarioTicker(),
      FBTC: scenarioTicker({ fail: { expirations: 'rate limited' } }),
      GBTC: scenarioTicker({
        chains: { [TARGET_EXPIRATION]: [makeCall({ strike: 52, lastPrice: 0.5, openInterest: 900 })] },
      }),
    });

    const report = await scanGroup(provider, 'BTC', ['IBIT', 'FBTC', 'GBTC'], {
      minDays: 20,
      maxDays: 40,
      itmCount: 2,
      otmCount: 5,
      concurrency: 2,
      referenceDay: REFERENCE_DAY,
    });

    expect(report.asset).toBe('BTC');
    expect(report.scanId).toMatch(UUID);
    expect(report.referenceDay).toBe(REFERENCE_DAY);
    expect(report.window).toEqual({ minDays: 20, maxDays: 40 });
    expect(report.outcomes.map(o => [o.ticker, o.status])).toEqual([
      ['IBIT', 'success'],
      ['FBTC', 'failure'],
      ['GBTC', 'success'],
    ]);
    expect(report.outcomes[1]).toEqual({
      status: 'failure',
      ticker: 'FBTC',
      reason: 'ProviderFailure',
      message: 'Error fetching data: rate limited',
    });
  });

  it('returns an empty report for an empty ticker list', async () => {
    const report = await scanGroup(new FakeProvider({}), 'ADA', [], {
      minDays: 20,
      maxDays: 40,
      itmCount: 2,
      otmCount: 5,
      concurrency: 4,
      referenceDay: REFERENCE_DAY,
    });
    expect(report.outcomes).toEqual([]);
  });
});

describe('sortByOpenInterest', () => {
  it('ranks successes by total open interest and puts failures last', () => {
    const sorted = sortByOpenInterest([failure('A'), success('B', 10), success('C', 500), failure('D'), success('E', 10)]);
    expect(sorted.map(o => o.ticker)).toEqual(['C', 'B', 'E', 'A', 'D']);
  });
});

describe('mapWithConcurrency', () => {
  it('never runs more than the limit at once and keeps input order', async () => {
    let active = 0;
    let peak = 0;
    const delays = [30, 5, 20, 1, 10];

    const results = await mapWithConcurrency(delays, 2, async (ms, i) => {
      active++;
      peak = Math.max(peak, active);
      await new Promise(resolve => setTimeout(resolve, ms));
      active--;
      return i * 10;
    });

    expect(results).toEqual([0, 10, 20, 30, 40]);
    expect(peak).toBe(2);
  });

  it('resolves immediately for no items', async () => {
    expect(await mapWithConcurrency([], 3, async () => 1)).toEqual([]);
  });
});
