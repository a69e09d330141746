import express from 'express';
import cors from 'cors';
import type { Express } from 'express';
import type { Server } from 'http';
import type { ScanService } from '../pipeline/scan-service.js';
import type { ScanSort } from '../types/scan.js';
import { toWireOutcome, toWireReport } from './serialize.js';

export interface AppOptions {
  /** `*` or a comma-separated list of allowed origins. */
  corsOrigins: string;
}

function corsOrigin(value: string): string | string[] {
  const origins = value.split(',').map(s => s.trim()).filter(Boolean);
  if (origins.length === 0 || origins.includes('*')) return '*';
  return origins;
}

function parseSort(value: unknown): ScanSort | null {
  if (value === undefined || value === '' || value === 'none') return 'none';
  if (value === 'open_interest') return 'open_interest';
  return null;
}

export function createApp(service: ScanService, options: AppOptions): Express {
  const app = express();
  app.use(cors({ origin: corsOrigin(options.corsOrigins) }));

  app.get('/', (_req, res) => {
    res.json({
      title: 'Crypto ETF Covered Call Scanner API',
      message: 'Use /scan/BTC, /scan/XRP, etc. Add ?sort=open_interest to rank tickers by open interest.',
    });
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', provider: service.providerName });
  });

  app.get('/groups', (_req, res) => {
    res.json({ groups: service.listGroups() });
  });

  // Asset group scan
  app.get('/scan/:asset', async (req, res) => {
    const sort = parseSort(req.query['sort']);
    if (sort === null) {
      return void res.status(400).json({ error: `Unsupported sort '${String(req.query['sort'])}'. Use 'open_interest'.` });
    }
    try {
      const result = await service.scanAsset(req.params.asset, sort);
      if (result.status === 'unknown_group') {
        return void res.status(404).json({ error: result.message });
      }
      res.json(toWireReport(result.report));
    } catch (err) {
      console.error(`[Server] scan ${req.params.asset} failed:`, err);
      res.status(500).json({ error: err instanceof Error ? err.message : String(err) });
    }
  });

  // Single ticker; the asset segment only scopes the URL
  app.get('/scan/:asset/:ticker', async (req, res) => {
    try {
      const outcome = await service.scanTicker(req.params.ticker);
      res.json(toWireOutcome(outcome));
    } catch (err) {
      console.error(`[Server] scan ${req.params.ticker} failed:`, err);
      res.status(500).json({ error: err instanceof Error ? err.message : String(err) });
    }
  });

  return app;
}

export function startServer(service: ScanService, port: number, options: AppOptions): Server {
  const app = createApp(service, options);
  return app.listen(port, () => {
    console.log(`[Server] Listening on http://localhost:${port}`);
  });
}
