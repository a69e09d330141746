import { toIsoDate } from '../lib/dates.js';
import { selectExpiration } from '../strategy/expiration-selector.js';
import { deriveStrategies } from '../strategy/strategy-deriver.js';
import type { MarketDataProvider, Week52Range } from '../types/market.js';
import type { ScanFailure, ScanFailureKind, ScanOptions, ScanOutcome } from '../types/scan.js';

type ProviderCall<T> = { ok: true; value: T } | { ok: false; message: string };

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function attempt<T>(fn: () => Promise<T>): Promise<ProviderCall<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (err) {
    return { ok: false, message: errorMessage(err) };
  }
}

function failure(ticker: string, reason: ScanFailureKind, message: string): ScanFailure {
  return { status: 'failure', ticker, reason, message };
}

function providerFailure(ticker: string, message: string): ScanFailure {
  return failure(ticker, 'ProviderFailure', `Error fetching data: ${message}`);
}

/** The range is informational; a failed lookup degrades to unknown high/low. */
async function fetchRange(provider: MarketDataProvider, ticker: string): Promise<Week52Range | null> {
  const range = await attempt(() => provider.get52WeekRange(ticker));
  if (range.ok) return range.value;
  console.warn(`[Scan] ${ticker}: 52-week range unavailable: ${range.message}`);
  return null;
}

/**
 * Full scan for one ticker: price, range, expirations, selector, chain,
 * deriver. Provider faults and "no data" cases come back as typed failures;
 * only invalid scan options (a programming error) throw.
 */
export async function scanTicker(
  provider: MarketDataProvider,
  ticker: string,
  options: ScanOptions,
): Promise<ScanOutcome> {
  const referenceDay = options.referenceDay ?? toIsoDate(new Date());

  const price = await attempt(() => provider.getCurrentPrice(ticker));
  if (!price.ok) return providerFailure(ticker, price.message);
  const currentPrice = price.value;
  if (currentPrice === null) {
    return failure(ticker, 'PriceUnavailable', `No current price for ${ticker}.`);
  }
  if (!Number.isFinite(currentPrice) || currentPrice <= 0) {
    return failure(ticker, 'InvalidPrice', `Invalid current price for ${ticker}: ${currentPrice}.`);
  }

  const range = await fetchRange(provider, ticker);

  const expirations = await attempt(() => provider.getAvailableExpirations(ticker));
  if (!expirations.ok) return providerFailure(ticker, expirations.message);
  if (expirations.value.length === 0) {
    return failure(ticker, 'NoExpirations', `No options for ${ticker}.`);
  }

  const selection = selectExpiration(expirations.value, referenceDay, options.minDays, options.maxDays);
  if (selection.status === 'not_found') {
    return failure(
      ticker,
      'NoSuitableExpiration',
      `No monthly expiration (${options.minDays}–${options.maxDays} days) for ${ticker}.`,
    );
  }

  const { expiration, daysToExpiration } = selection;
  const chain = await attempt(() => provider.getCallChain(ticker, expiration));
  if (!chain.ok) return providerFailure(ticker, chain.message);

  const derivation = deriveStrategies(currentPrice, chain.value, options.itmCount, options.otmCount);
  const base = {
    status: 'success' as const,
    ticker,
    currentPrice,
    week52High: range?.high ?? null,
    week52Low: range?.low ?? null,
    expiration,
    daysToExpiration,
  };

  if (derivation.status === 'empty') {
    return {
      ...base,
      strategies: [],
      totalOpenInterest: 0,
      notice: { kind: 'EmptyStrategySet', message: 'No calls with positive bid/last price.' },
    };
  }
  return { ...base, strategies: derivation.strategies, totalOpenInterest: derivation.totalOpenInterest };
}
