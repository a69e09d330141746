import { addDays, toIsoDate } from '../lib/dates.js';
import { coerceNumber, fetchJson } from '../lib/http.js';
import { MarketDataError } from './errors.js';
import type { IsoDate, MarketDataProvider, RawOptionRecord, Week52Range } from '../types/market.js';

// Alpaca option contract response shape
interface AlpacaOptionContract {
  symbol: string;
  expiration_date: string;
  strike_price: string;
  type: 'call' | 'put';
  open_interest?: string | null;
}

interface AlpacaOptionSnapshot {
  greeks?: {
    implied_volatility?: number;
  };
  impliedVolatility?: number;
  latestQuote?: {
    ap?: number;  // ask
    bp?: number;  // bid
  };
  latestTrade?: {
    p?: number;  // price
  };
}

interface AlpacaBar {
  h?: number;
  l?: number;
}

interface Paged {
  next_page_token?: string | null;
}

export interface AlpacaConfig {
  apiKey?: string;
  secretKey?: string;
  baseUrl: string;
  dataUrl: string;
  timeoutMs: number;
  now?: () => Date;
}

const PROVIDER = 'Alpaca';
const MAX_PAGES = 10;

export class AlpacaProvider implements MarketDataProvider {
  readonly name = 'alpaca';
  private now: () => Date;

  constructor(private cfg: AlpacaConfig) {
    this.now = cfg.now ?? (() => new Date());
  }

  private headers(): Record<string, string> {
    if (!this.cfg.apiKey || !this.cfg.secretKey) {
      throw new MarketDataError(PROVIDER, 'ALPACA_API_KEY and ALPACA_SECRET_KEY must be set');
    }
    return {
      'APCA-API-KEY-ID': this.cfg.apiKey,
      'APCA-API-SECRET-KEY': this.cfg.secretKey,
    };
  }

  private get<T>(url: URL): Promise<T> {
    return fetchJson<T>({ provider: PROVIDER, url, headers: this.headers(), timeoutMs: this.cfg.timeoutMs });
  }

  /** Walk `next_page_token` pages; `collect` pulls the rows out of each page. */
  private async getAllPages<P extends Paged, T>(url: URL, collect: (page: P) => T[]): Promise<T[]> {
    const rows: T[] = [];
    for (let page = 0; page < MAX_PAGES; page++) {
      const data = await this.get<P>(url);
      rows.push(...collect(data));
      if (!data.next_page_token) break;
      url.searchParams.set('page_token', data.next_page_token);
    }
    return rows;
  }

  async getCurrentPrice(ticker: string): Promise<number | null> {
    const url = new URL(`${this.cfg.dataUrl}/v2/stocks/${encodeURIComponent(ticker)}/trades/latest`);
    url.searchParams.set('feed', 'iex');
    const data = await this.get<{ trade?: { p?: number } }>(url);
    return coerceNumber(data.trade?.p);
  }

  async get52WeekRange(ticker: string): Promise<Week52Range | null> {
    const today = toIsoDate(this.now());
    const url = new URL(`${this.cfg.dataUrl}/v2/stocks/${encodeURIComponent(ticker)}/bars`);
    url.searchParams.set('timeframe', '1Day');
    url.searchParams.set('start', addDays(today, -365));
    url.searchParams.set('limit', '10000');
    url.searchParams.set('adjustment', 'raw');
    url.searchParams.set('feed', 'iex');

    const bars = await this.getAllPages<Paged & { bars?: AlpacaBar[] | null }, AlpacaBar>(url, p => p.bars ?? []);
    let high: number | null = null;
    let low: number | null = null;
    for (const bar of bars) {
      const h = coerceNumber(bar.h);
      const l = coerceNumber(bar.l);
      if (h !== null && (high === null || h > high)) high = h;
      if (l !== null && (low === null || l < low)) low = l;
    }
    return high !== null && low !== null ? { high, low } : null;
  }

  private fetchContracts(ticker: string, filter: Record<string, string>): Promise<AlpacaOptionContract[]> {
    const url = new URL(`${this.cfg.baseUrl}/v2/options/contracts`);
    url.searchParams.set('underlying_symbols', ticker);
    url.searchParams.set('type', 'call');
    url.searchParams.set('limit', '10000');
    for (const [k, v] of Object.entries(filter)) url.searchParams.set(k, v);

    return this.getAllPages<Paged & { option_contracts?: AlpacaOptionContract[] }, AlpacaOptionContract>(
      url,
      p => p.option_contracts ?? [],
    );
  }

  async getAvailableExpirations(ticker: string): Promise<IsoDate[]> {
    const contracts = await this.fetchContracts(ticker, { expiration_date_gte: toIsoDate(this.now()) });
    return [...new Set(contracts.map(c => c.expiration_date))].sort();
  }

  async getCallChain(ticker: string, expiration: IsoDate): Promise<RawOptionRecord[]> {
    const url = new URL(`${this.cfg.dataUrl}/v1beta1/options/snapshots/${encodeURIComponent(ticker)}`);
    url.searchParams.set('type', 'call');
    url.searchParams.set('expiration_date', expiration);
    url.searchParams.set('feed', 'indicative');
    url.searchParams.set('limit', '1000');

    // Snapshots carry quotes but no open interest; contracts carry both strike and OI.
    const [contracts, snapshotPages] = await Promise.all([
      this.fetchContracts(ticker, { expiration_date: expiration }),
      this.getAllPages<Paged & { snapshots?: Record<string, AlpacaOptionSnapshot> }, Record<string, AlpacaOptionSnapshot>>(
        url,
        p => (p.snapshots ? [p.snapshots] : []),
      ),
    ]);
    const snapshots = new Map<string, AlpacaOptionSnapshot>();
    for (const page of snapshotPages) {
      for (const [symbol, snap] of Object.entries(page)) snapshots.set(symbol, snap);
    }

    const records: RawOptionRecord[] = [];
    for (const contract of contracts) {
      if (contract.type !== 'call') continue;
      const strike = coerceNumber(contract.strike_price);
      if (strike === null) continue;
      const snap = snapshots.get(contract.symbol);
      records.push({
        strike,
        lastPrice: coerceNumber(snap?.latestTrade?.p),
        bid: coerceNumber(snap?.latestQuote?.bp),
        openInterest: coerceNumber(contract.open_interest) ?? 0,
        impliedVolatility: coerceNumber(snap?.impliedVolatility) ?? coerceNumber(snap?.greeks?.implied_volatility) ?? 0,
      });
    }
    return records;
  }
}
