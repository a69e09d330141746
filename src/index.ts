import 'dotenv/config';
import { config, parseGroupList } from './config.js';
import { createScanService } from './pipeline/scan-service.js';
import { createMarketDataProvider } from './providers/index.js';
import { startScheduler } from './scheduler.js';
import { startServer } from './server/app.js';
import { loadAssetGroups } from './universe/asset-groups.js';

async function main(): Promise<void> {
  console.log(`[Boot] covered-call-scanner starting (${config.NODE_ENV})`);

  // ── Market data + asset universe ────────────────────────────────────────
  const provider = createMarketDataProvider(config);
  const groups = loadAssetGroups(config.ASSET_GROUPS_FILE);
  console.log(`[Boot] Provider: ${provider.name}; ${groups.list().length} asset group(s)`);

  const service = createScanService(config, provider, groups);

  // ── HTTP API ────────────────────────────────────────────────────────────
  const server = startServer(service, config.PORT, { corsOrigins: config.CORS_ORIGINS });

  // ── Pre-warm scheduler ──────────────────────────────────────────────────
  const task = startScheduler(service, config.PREWARM_CRON, parseGroupList(config.PREWARM_GROUPS));

  console.log(
    `[Boot] Scan window ${config.EXPIRY_MIN_DAYS}-${config.EXPIRY_MAX_DAYS} days, ` +
      `${config.ITM_COUNT} ITM / ${config.OTM_COUNT} OTM strikes`,
  );

  // ── Graceful shutdown ───────────────────────────────────────────────────
  const shutdown = (signal: string): void => {
    console.log(`[Boot] ${signal} received, shutting down`);
    task?.stop();
    server.close(() => process.exit(0));
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch(err => {
  console.error('[Boot] Fatal error:', err);
  process.exit(1);
});
