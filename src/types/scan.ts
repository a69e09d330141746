import type { IsoDate } from './market.js';
import type { ExpiryWindow, SelectionCounts, StrategyResult } from './strategy.js';

export type ScanFailureKind =
  | 'PriceUnavailable'
  | 'NoExpirations'
  | 'NoSuitableExpiration'
  | 'EmptyStrategySet'
  | 'InvalidPrice'
  | 'ProviderFailure';

export interface ScanNotice {
  kind: 'EmptyStrategySet';
  message: string;
}

export interface ScanSuccess {
  status: 'success';
  ticker: string;
  currentPrice: number;
  week52High: number | null;
  week52Low: number | null;
  expiration: IsoDate;
  daysToExpiration: number;
  strategies: readonly StrategyResult[];   // ITM closest-first, then OTM closest-first
  totalOpenInterest: number;
  notice?: ScanNotice;
}

export interface ScanFailure {
  status: 'failure';
  ticker: string;
  reason: ScanFailureKind;
  message: string;
}

export type ScanOutcome = ScanSuccess | ScanFailure;

export interface ScanOptions extends ExpiryWindow, SelectionCounts {
  /** Day the expiry window is measured from; defaults to today (UTC). */
  referenceDay?: IsoDate;
}

export interface ScanReport {
  scanId: string;
  asset: string;
  generatedAt: string;         // ISO 8601
  referenceDay: IsoDate;
  window: ExpiryWindow;
  outcomes: readonly ScanOutcome[];
}

export type ScanSort = 'none' | 'open_interest';

export type AssetScanResult =
  | { status: 'ok'; report: ScanReport }
  | { status: 'unknown_group'; asset: string; message: string };
