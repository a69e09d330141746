import type { Config } from '../config.js';
import { MemoryScanCache, scanCacheKey, timeBucket, withScanCache } from '../cache/scan-cache.js';
import type { ScanCache } from '../cache/scan-cache.js';
import { toIsoDate } from '../lib/dates.js';
import type { AssetGroup, AssetGroups } from '../universe/asset-groups.js';
import type { MarketDataProvider } from '../types/market.js';
import type { AssetScanResult, ScanOutcome, ScanReport, ScanSort } from '../types/scan.js';
import type { ExpiryWindow, SelectionCounts } from '../types/strategy.js';
import { scanGroup, sortByOpenInterest } from './group-scan.js';
import { scanTicker } from './ticker-scan.js';

export interface ScanServiceOptions extends ExpiryWindow, SelectionCounts {
  concurrency: number;
  cacheBucketMs: number;
}

export interface ScanServiceDeps {
  provider: MarketDataProvider;
  groups: AssetGroups;
  options: ScanServiceOptions;
  /** Omit to scan on every request. */
  cache?: ScanCache<ScanReport>;
  clock?: () => Date;
}

/**
 * Entry point shared by the HTTP server, the pre-warm scheduler and the MCP
 * tools. Group reports are cached per (asset, reference day, time bucket);
 * sorting happens after the cache so one report serves every ordering.
 */
export class ScanService {
  private inflight = new Map<string, Promise<ScanReport>>();
  private clock: () => Date;

  constructor(private deps: ScanServiceDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  get options(): Readonly<ScanServiceOptions> {
    return this.deps.options;
  }

  get providerName(): string {
    return this.deps.provider.name;
  }

  listGroups(): AssetGroup[] {
    return this.deps.groups.list();
  }

  async scanAsset(asset: string, sort: ScanSort = 'none'): Promise<AssetScanResult> {
    const name = asset.trim().toUpperCase();
    const tickers = this.deps.groups.tickers(name);
    if (tickers.length === 0) {
      return { status: 'unknown_group', asset: name, message: `No ETFs for '${name}'.` };
    }

    const report = await this.loadReport(name, tickers);
    if (sort === 'open_interest') {
      return { status: 'ok', report: { ...report, outcomes: sortByOpenInterest(report.outcomes) } };
    }
    return { status: 'ok', report };
  }

  /** Scan a single ticker, outside any group and uncached. */
  scanTicker(ticker: string): Promise<ScanOutcome> {
    const { minDays, maxDays, itmCount, otmCount } = this.deps.options;
    return scanTicker(this.deps.provider, ticker.trim().toUpperCase(), {
      minDays,
      maxDays,
      itmCount,
      otmCount,
      referenceDay: toIsoDate(this.clock()),
    });
  }

  private loadReport(asset: string, tickers: string[]): Promise<ScanReport> {
    const now = this.clock();
    const { cache } = this.deps;
    const { concurrency, minDays, maxDays, itmCount, otmCount, cacheBucketMs } = this.deps.options;
    const referenceDay = toIsoDate(now);
    const run = () =>
      scanGroup(this.deps.provider, asset, tickers, {
        concurrency,
        minDays,
        maxDays,
        itmCount,
        otmCount,
        referenceDay,
      });

    if (!cache) return run();

    const key = scanCacheKey(asset, referenceDay, timeBucket(now.getTime(), cacheBucketMs));
    const running = this.inflight.get(key);
    if (running) return running;

    const load = withScanCache(cache, key, run).finally(() => {
      this.inflight.delete(key);
    });
    this.inflight.set(key, load);
    return load;
  }
}

export function createScanService(cfg: Config, provider: MarketDataProvider, groups: AssetGroups): ScanService {
  return new ScanService({
    provider,
    groups,
    cache: new MemoryScanCache<ScanReport>(cfg.SCAN_CACHE_MAX_ENTRIES),
    options: {
      minDays: cfg.EXPIRY_MIN_DAYS,
      maxDays: cfg.EXPIRY_MAX_DAYS,
      itmCount: cfg.ITM_COUNT,
      otmCount: cfg.OTM_COUNT,
      concurrency: cfg.SCAN_CONCURRENCY,
      cacheBucketMs: cfg.SCAN_CACHE_TTL_MS,
    },
  });
}
