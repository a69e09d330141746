import { describe, it, expect, vi, beforeEach } from 'vitest';
import { scanTicker } from '../src/pipeline/ticker-scan.js';
import type { ScanOptions } from '../src/types/scan.js';
import { FakeProvider, REFERENCE_DAY, TARGET_EXPIRATION, makeCall, scenarioTicker } from './helpers/fake-provider.js';

const OPTIONS: ScanOptions = { minDays: 20, maxDays: 40, itmCount: 2, otmCount: 5, referenceDay: REFERENCE_DAY };

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
});

describe('scanTicker', () => {
  it('returns a success record for the nearest in-window expiration', async () => {
    const provider = new FakeProvider({ IBIT: scenarioTicker() });
    const outcome = await scanTicker(provider, 'IBIT', OPTIONS);

    expect(outcome.status).toBe('success');
    if (outcome.status !== 'success') return;
    expect(outcome.ticker).toBe('IBIT');
    expect(outcome.currentPrice).toBe(50);
    expect(outcome.week52High).toBe(70);
    expect(outcome.week52Low).toBe(30);
    expect(outcome.expiration).toBe(TARGET_EXPIRATION);
    expect(outcome.daysToExpiration).toBe(25);
    expect(outcome.strategies.map(s => s.strike)).toEqual([45, 55, 60]);
    expect(outcome.totalOpenInterest).toBe(150);
    expect(outcome.notice).toBeUndefined();
    expect(provider.calls).toEqual([
      'price:IBIT',
      'range:IBIT',
      'expirations:IBIT',
      'chain:IBIT',
    ]);
  });

  it('reports PriceUnavailable when the provider has no price', async () => {
    const provider = new FakeProvider({ IBIT: scenarioTicker({ price: null }) });
    expect(await scanTicker(provider, 'IBIT', OPTIONS)).toEqual({
      status: 'failure',
      ticker: 'IBIT',
      reason: 'PriceUnavailable',
      message: 'No current price for IBIT.',
    });
    expect(provider.count('expirations')).toBe(0);
  });

  it.each([0, -3, Number.NaN])('reports InvalidPrice for price %s', async price => {
    const provider = new FakeProvider({ IBIT: scenarioTicker({ price }) });
    const outcome = await scanTicker(provider, 'IBIT', OPTIONS);
    expect(outcome.status === 'failure' && outcome.reason).toBe('InvalidPrice');
  });

  it('reports NoExpirations for a ticker without listed options', async () => {
    const provider = new FakeProvider({ IBIT: scenarioTicker({ expirations: [] }) });
    expect(await scanTicker(provider, 'IBIT', OPTIONS)).toEqual({
      status: 'failure',
      ticker: 'IBIT',
      reason: 'NoExpirations',
      message: 'No options for IBIT.',
    });
  });

  it('reports NoSuitableExpiration when nothing falls in the window', async () => {
    const provider = new FakeProvider({ IBIT: scenarioTicker({ expirations: ['2026-03-06', '2026-04-17'] }) });
    expect(await scanTicker(provider, 'IBIT', OPTIONS)).toEqual({
      status: 'failure',
      ticker: 'IBIT',
      reason: 'NoSuitableExpiration',
      message: 'No monthly expiration (20–40 days) for IBIT.',
    });
    expect(provider.count('chain')).toBe(0);
  });

  it('surfaces an unpriced chain as a success with an empty strategy list', async () => {
    const provider = new FakeProvider({
      IBIT: scenarioTicker({ chains: { [TARGET_EXPIRATION]: [makeCall({ strike: 55, lastPrice: 0, bid: 0, openInterest: 80 })] } }),
    });
    const outcome = await scanTicker(provider, 'IBIT', OPTIONS);
    expect(outcome).toMatchObject({
      status: 'success',
      expiration: TARGET_EXPIRATION,
      strategies: [],
      totalOpenInterest: 0,
      notice: { kind: 'EmptyStrategySet', message: 'No calls with positive bid/last price.' },
    });
  });

  it('wraps provider exceptions as ProviderFailure', async () => {
    const provider = new FakeProvider({ IBIT: scenarioTicker({ fail: { chain: 'socket hang up' } }) });
    expect(await scanTicker(provider, 'IBIT', OPTIONS)).toEqual({
      status: 'failure',
      ticker: 'IBIT',
      reason: 'ProviderFailure',
      message: 'Error fetching data: socket hang up',
    });
  });

  it('reports ProviderFailure when the price lookup throws', async () => {
    const provider = new FakeProvider({ IBIT: scenarioTicker({ fail: { price: 'Polygon: API error 403' } }) });
    const outcome = await scanTicker(provider, 'IBIT', OPTIONS);
    expect(outcome.status === 'failure' && outcome.message).toBe('Error fetching data: Polygon: API error 403');
  });

  it('degrades a failed or empty 52-week range to null high/low', async () => {
    const failing = new FakeProvider({ IBIT: scenarioTicker({ fail: { range: 'timeout' } }) });
    const empty = new FakeProvider({ IBIT: scenarioTicker({ range: null }) });

    for (const provider of [failing, empty]) {
      const outcome = await scanTicker(provider, 'IBIT', OPTIONS);
      expect(outcome).toMatchObject({ status: 'success', week52High: null, week52Low: null });
    }
  });

  it('rejects invalid scan options instead of reporting a data failure', async () => {
    const provider = new FakeProvider({ IBIT: scenarioTicker() });
    await expect(scanTicker(provider, 'IBIT', { ...OPTIONS, minDays: 50, maxDays: 10 })).rejects.toThrow(RangeError);
  });
});
