import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { ScanService } from '../pipeline/scan-service.js';
import { listAssetGroups, scanAsset, scanSingleTicker } from './tools.js';

export function createMcpServer(service: ScanService): McpServer {
  const server = new McpServer({ name: 'covered-call-scanner', version: '1.0.0' });
  const { minDays, maxDays, itmCount, otmCount } = service.options;

  // ── Asset groups ──────────────────────────────────────────────────────────────
  server.tool('list_asset_groups', 'List the asset groups and the ETF tickers scanned for each', {}, async () =>
    listAssetGroups(service),
  );

  // ── Group scan ────────────────────────────────────────────────────────────────
  server.tool(
    'scan_asset',
    `Covered-call strategies (${itmCount} closest ITM, ${otmCount} closest OTM strikes) for every ETF of an asset group`,
    {
      asset: z.string().min(1).describe('Asset group, e.g. BTC, ETH, SOL'),
      sort_by_open_interest: z.boolean().optional().describe('Rank tickers by total open interest, largest first'),
    },
    async args => scanAsset(service, args),
  );

  // ── Single ticker ─────────────────────────────────────────────────────────────
  server.tool(
    'scan_ticker',
    `Covered-call strategies for one ticker at the nearest ${minDays}-${maxDays} day expiration`,
    {
      ticker: z.string().min(1).describe('Underlying ticker, e.g. IBIT'),
    },
    async args => scanSingleTicker(service, args),
  );

  return server;
}
