import { v4 as uuidv4 } from 'uuid';
import { mapWithConcurrency } from '../lib/concurrency.js';
import { toIsoDate } from '../lib/dates.js';
import { scanTicker } from './ticker-scan.js';
import type { MarketDataProvider } from '../types/market.js';
import type { ScanOptions, ScanOutcome, ScanReport } from '../types/scan.js';

export interface GroupScanOptions extends ScanOptions {
  concurrency: number;
}

/**
 * Scan every ticker of an asset group. Best effort: a failing ticker becomes a
 * failure entry and the rest of the group still runs. Outcomes keep group order.
 */
export async function scanGroup(
  provider: MarketDataProvider,
  asset: string,
  tickers: readonly string[],
  options: GroupScanOptions,
): Promise<ScanReport> {
  const startedAt = Date.now();
  const referenceDay = options.referenceDay ?? toIsoDate(new Date());
  const scanOptions: ScanOptions = { ...options, referenceDay };

  console.log(`[Scan] ${asset}: ${tickers.length} ticker(s) via ${provider.name}, reference day ${referenceDay}`);

  const outcomes = await mapWithConcurrency(tickers, options.concurrency, async ticker => {
    const outcome = await scanTicker(provider, ticker, scanOptions);
    if (outcome.status === 'failure') {
      console.warn(`[Scan] ${ticker}: ${outcome.reason}: ${outcome.message}`);
    }
    return outcome;
  });

  const ok = outcomes.filter(o => o.status === 'success').length;
  console.log(`[Scan] ${asset}: ${ok}/${outcomes.length} succeeded in ${Date.now() - startedAt}ms`);

  return {
    scanId: uuidv4(),
    asset,
    generatedAt: new Date().toISOString(),
    referenceDay,
    window: { minDays: options.minDays, maxDays: options.maxDays },
    outcomes,
  };
}

/**
 * Successes by total open interest, largest first; failures follow in their
 * original order. Ties keep their original order.
 */
export function sortByOpenInterest(outcomes: readonly ScanOutcome[]): ScanOutcome[] {
  const successes = outcomes.filter(o => o.status === 'success');
  const failures = outcomes.filter(o => o.status === 'failure');
  const totalOi = (o: ScanOutcome) => (o.status === 'success' ? o.totalOpenInterest : 0);
  return [...successes.sort((a, b) => totalOi(b) - totalOi(a)), ...failures];
}
