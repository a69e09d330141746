/** ISO calendar date, YYYY-MM-DD. */
export type IsoDate = string;

export interface Week52Range {
  high: number;
  low: number;
}

/** One call contract row as a provider returns it, before any filtering. */
export interface RawOptionRecord {
  strike: number;
  lastPrice: number | null;    // last trade
  bid: number | null;
  openInterest: number;
  impliedVolatility: number;   // opaque, passed through
}

/**
 * Normalized market data capability. Vendor-specific fields never leave the
 * implementation; every provider hands back these shapes.
 */
export interface MarketDataProvider {
  readonly name: string;
  /** Latest trade price, or null when the vendor has none. */
  getCurrentPrice(ticker: string): Promise<number | null>;
  /** High/low over the trailing 52 weeks, or null with no daily bars. */
  get52WeekRange(ticker: string): Promise<Week52Range | null>;
  getAvailableExpirations(ticker: string): Promise<IsoDate[]>;
  getCallChain(ticker: string, expiration: IsoDate): Promise<RawOptionRecord[]>;
}
