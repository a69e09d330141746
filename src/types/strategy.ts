import type { IsoDate } from './market.js';

export interface PricedCandidate {
  strike: number;
  premium: number;             // last trade, else bid; always > 0
  impliedVolatility: number;
  openInterest: number;
}

export interface StrategyResult extends PricedCandidate {
  capGain: number;             // strike - current price
  totalReturnPct: number;      // (premium + capGain) / current price * 100
  premiumYieldPct: number;     // premium / current price * 100
  downsideBreakeven: number;   // current price - premium
}

export type Derivation =
  | { status: 'derived'; strategies: readonly StrategyResult[]; totalOpenInterest: number }
  | { status: 'empty' };

export type ExpirationSelection =
  | { status: 'found'; expiration: IsoDate; daysToExpiration: number }
  | { status: 'not_found' };

export interface ExpiryWindow {
  minDays: number;
  maxDays: number;
}

export interface SelectionCounts {
  itmCount: number;
  otmCount: number;
}
