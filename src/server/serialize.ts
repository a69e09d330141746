import type { ScanOutcome, ScanReport } from '../types/scan.js';
import type { StrategyResult } from '../types/strategy.js';

// Wire shapes: snake_case, values passed through unrounded.

export interface WireStrategy {
  strike: number;
  premium: number;
  implied_volatility: number;
  open_interest: number;
  cap_gain: number;
  total_return_pct: number;
  premium_yield_pct: number;
  downside_breakeven: number;
}

export interface WireSuccess {
  ticker: string;
  current_price: number;
  week52_high: number | null;
  week52_low: number | null;
  expiration: string;
  days_to_expiration: number;
  strategies: WireStrategy[];
  total_open_interest: number;
  message?: string;
}

export interface WireFailure {
  ticker: string;
  error: string;
  error_kind: string;
}

export type WireOutcome = WireSuccess | WireFailure;

export interface WireReport {
  scan_id: string;
  asset: string;
  generated_at: string;
  reference_day: string;
  expiry_window: { min_days: number; max_days: number };
  results: Record<string, WireOutcome>;
}

export function toWireStrategy(s: StrategyResult): WireStrategy {
  return {
    strike: s.strike,
    premium: s.premium,
    implied_volatility: s.impliedVolatility,
    open_interest: s.openInterest,
    cap_gain: s.capGain,
    total_return_pct: s.totalReturnPct,
    premium_yield_pct: s.premiumYieldPct,
    downside_breakeven: s.downsideBreakeven,
  };
}

export function toWireOutcome(outcome: ScanOutcome): WireOutcome {
  if (outcome.status === 'failure') {
    return { ticker: outcome.ticker, error: outcome.message, error_kind: outcome.reason };
  }
  const wire: WireSuccess = {
    ticker: outcome.ticker,
    current_price: outcome.currentPrice,
    week52_high: outcome.week52High,
    week52_low: outcome.week52Low,
    expiration: outcome.expiration,
    days_to_expiration: outcome.daysToExpiration,
    strategies: outcome.strategies.map(toWireStrategy),
    total_open_interest: outcome.totalOpenInterest,
  };
  if (outcome.notice) wire.message = outcome.notice.message;
  return wire;
}

/** Outcome order becomes the key order of `results`. */
export function toWireReport(report: ScanReport): WireReport {
  const results: Record<string, WireOutcome> = {};
  for (const outcome of report.outcomes) {
    results[outcome.ticker] = toWireOutcome(outcome);
  }
  return {
    scan_id: report.scanId,
    asset: report.asset,
    generated_at: report.generatedAt,
    reference_day: report.referenceDay,
    expiry_window: { min_days: report.window.minDays, max_days: report.window.maxDays },
    results,
  };
}
