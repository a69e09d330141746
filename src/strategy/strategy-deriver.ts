import type { RawOptionRecord } from '../types/market.js';
import type { Derivation, PricedCandidate, StrategyResult } from '../types/strategy.js';

export const DEFAULT_ITM_COUNT = 2;
export const DEFAULT_OTM_COUNT = 5;

function isPositive(value: number | null): value is number {
  return value !== null && Number.isFinite(value) && value > 0;
}

/**
 * Premium a covered-call writer can realistically receive: the last trade if
 * there is one, otherwise the bid. Ask and bid/ask midpoint are never used.
 */
export function resolvePremium(record: RawOptionRecord): number | null {
  if (isPositive(record.lastPrice)) return record.lastPrice;
  if (isPositive(record.bid)) return record.bid;
  return null;
}

/** Drop every record without a positive premium. */
export function priceCandidates(rawCalls: readonly RawOptionRecord[]): PricedCandidate[] {
  const priced: PricedCandidate[] = [];
  for (const record of rawCalls) {
    const premium = resolvePremium(record);
    if (premium === null) continue;
    priced.push({
      strike: record.strike,
      premium,
      impliedVolatility: record.impliedVolatility,
      openInterest: record.openInterest,
    });
  }
  return priced;
}

/**
 * Closest-to-money first on each side; at-the-money and non-finite strikes
 * belong to neither.
 */
export function bucketCandidates(
  candidates: readonly PricedCandidate[],
  currentPrice: number,
  itmCount: number,
  otmCount: number,
): { itm: PricedCandidate[]; otm: PricedCandidate[] } {
  const itm = candidates
    .filter(c => Number.isFinite(c.strike) && c.strike < currentPrice)
    .sort((a, b) => b.strike - a.strike)
    .slice(0, itmCount);
  const otm = candidates
    .filter(c => Number.isFinite(c.strike) && c.strike > currentPrice)
    .sort((a, b) => a.strike - b.strike)
    .slice(0, otmCount);
  return { itm, otm };
}

export function computeMetrics(candidate: PricedCandidate, currentPrice: number): StrategyResult {
  const capGain = candidate.strike - currentPrice;
  return {
    ...candidate,
    capGain,
    totalReturnPct: ((candidate.premium + capGain) / currentPrice) * 100,
    premiumYieldPct: (candidate.premium / currentPrice) * 100,
    downsideBreakeven: currentPrice - candidate.premium,
  };
}

function assertCount(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
  }
}

/**
 * Turn one expiration's raw call chain into ranked covered-call strategies.
 *
 * Output order is the ITM bucket (strike descending) followed by the OTM
 * bucket (strike ascending). Returns `empty` when no record survives premium
 * resolution. Throws RangeError for a non-positive price or a bad count.
 */
export function deriveStrategies(
  currentPrice: number,
  rawCalls: readonly RawOptionRecord[],
  itmCount = DEFAULT_ITM_COUNT,
  otmCount = DEFAULT_OTM_COUNT,
): Derivation {
  if (!Number.isFinite(currentPrice) || currentPrice <= 0) {
    throw new RangeError(`currentPrice must be a positive number, got ${currentPrice}`);
  }
  assertCount('itmCount', itmCount);
  assertCount('otmCount', otmCount);

  const priced = priceCandidates(rawCalls);
  if (priced.length === 0) return { status: 'empty' };

  const { itm, otm } = bucketCandidates(priced, currentPrice, itmCount, otmCount);
  const strategies = Object.freeze([...itm, ...otm].map(c => Object.freeze(computeMetrics(c, currentPrice))));
  const totalOpenInterest = strategies.reduce((sum, s) => sum + s.openInterest, 0);

  return { status: 'derived', strategies, totalOpenInterest };
}
