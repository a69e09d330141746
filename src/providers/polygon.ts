import { addDays, toIsoDate } from '../lib/dates.js';
import { coerceNumber, fetchJson } from '../lib/http.js';
import { MarketDataError } from './errors.js';
import type { IsoDate, MarketDataProvider, RawOptionRecord, Week52Range } from '../types/market.js';

// Polygon response shapes (only the fields we read)
interface PolygonTickerSnapshot {
  ticker?: {
    lastTrade?: { p?: number };
    day?: { c?: number };
    prevDay?: { c?: number };
  };
}

interface PolygonAggsResponse {
  results?: Array<{ h?: number; l?: number }>;
}

interface PolygonPage<T> {
  results?: T[];
  next_url?: string;
}

interface PolygonContract {
  expiration_date?: string;
}

interface PolygonOptionSnapshot {
  details?: {
    contract_type?: string;
    strike_price?: number;
  };
  last_quote?: { bid?: number; ask?: number };
  last_trade?: { price?: number };
  greeks?: { implied_volatility?: number };
  implied_volatility?: number;
  open_interest?: number;
}

export interface PolygonConfig {
  apiKey?: string;
  baseUrl: string;
  timeoutMs: number;
  now?: () => Date;
}

const PROVIDER = 'Polygon';
const MAX_PAGES = 10;

export class PolygonProvider implements MarketDataProvider {
  readonly name = 'polygon';
  private now: () => Date;

  constructor(private cfg: PolygonConfig) {
    this.now = cfg.now ?? (() => new Date());
  }

  private headers(): Record<string, string> {
    if (!this.cfg.apiKey) {
      throw new MarketDataError(PROVIDER, 'Polygon API key not set. Contact admin.');
    }
    return { Authorization: `Bearer ${this.cfg.apiKey}` };
  }

  private get<T>(url: URL | string): Promise<T> {
    return fetchJson<T>({ provider: PROVIDER, url, headers: this.headers(), timeoutMs: this.cfg.timeoutMs });
  }

  /** Follow `next_url` links, collecting every page's results. */
  private async getAllPages<T>(first: URL): Promise<T[]> {
    const rows: T[] = [];
    let next: string | undefined = first.toString();
    for (let page = 0; next && page < MAX_PAGES; page++) {
      const data: PolygonPage<T> = await this.get<PolygonPage<T>>(next);
      rows.push(...(data.results ?? []));
      next = data.next_url;
    }
    return rows;
  }

  async getCurrentPrice(ticker: string): Promise<number | null> {
    const url = new URL(`${this.cfg.baseUrl}/v3/snapshot/locale/us/markets/stocks/tickers/${encodeURIComponent(ticker)}`);
    const data = await this.get<PolygonTickerSnapshot>(url);
    const snap = data.ticker;
    return (
      coerceNumber(snap?.lastTrade?.p) ??
      coerceNumber(snap?.day?.c) ??
      coerceNumber(snap?.prevDay?.c)
    );
  }

  async get52WeekRange(ticker: string): Promise<Week52Range | null> {
    const today = toIsoDate(this.now());
    const from = addDays(today, -365);
    const url = new URL(`${this.cfg.baseUrl}/v2/aggs/ticker/${encodeURIComponent(ticker)}/range/1/day/${from}/${today}`);
    url.searchParams.set('adjusted', 'true');
    url.searchParams.set('sort', 'asc');
    url.searchParams.set('limit', '50000');

    const data = await this.get<PolygonAggsResponse>(url);
    const highs: number[] = [];
    const lows: number[] = [];
    for (const bar of data.results ?? []) {
      const h = coerceNumber(bar.h);
      const l = coerceNumber(bar.l);
      if (h !== null) highs.push(h);
      if (l !== null) lows.push(l);
    }
    if (highs.length === 0 || lows.length === 0) return null;
    return { high: Math.max(...highs), low: Math.min(...lows) };
  }

  async getAvailableExpirations(ticker: string): Promise<IsoDate[]> {
    const url = new URL(`${this.cfg.baseUrl}/v3/reference/options/contracts`);
    url.searchParams.set('underlying_ticker', ticker);
    url.searchParams.set('contract_type', 'call');
    url.searchParams.set('expiration_date.gte', toIsoDate(this.now()));
    url.searchParams.set('limit', '1000');

    const contracts = await this.getAllPages<PolygonContract>(url);
    const expirations = new Set<IsoDate>();
    for (const c of contracts) {
      if (c.expiration_date) expirations.add(c.expiration_date);
    }
    return [...expirations].sort();
  }

  async getCallChain(ticker: string, expiration: IsoDate): Promise<RawOptionRecord[]> {
    const url = new URL(`${this.cfg.baseUrl}/v3/snapshot/options/${encodeURIComponent(ticker)}`);
    url.searchParams.set('expiration_date', expiration);
    url.searchParams.set('contract_type', 'call');
    url.searchParams.set('limit', '250');

    const snapshots = await this.getAllPages<PolygonOptionSnapshot>(url);
    const records: RawOptionRecord[] = [];
    for (const s of snapshots) {
      if (s.details?.contract_type !== 'call') continue;
      const strike = coerceNumber(s.details.strike_price);
      if (strike === null) continue;
      records.push({
        strike,
        lastPrice: coerceNumber(s.last_trade?.price),
        bid: coerceNumber(s.last_quote?.bid),
        openInterest: coerceNumber(s.open_interest) ?? 0,
        impliedVolatility: coerceNumber(s.implied_volatility) ?? coerceNumber(s.greeks?.implied_volatility) ?? 0,
      });
    }
    return records;
  }
}
