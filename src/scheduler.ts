import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import type { ScanService } from './pipeline/scan-service.js';

export interface PrewarmSummary {
  skipped: boolean;
  scanned: string[];
  failed: string[];
}

let isRunning = false;

/**
 * Scan each group once so the cache holds a report for the current time
 * bucket. Overlapping runs are skipped; a failing group does not stop the rest.
 */
export async function runPrewarm(service: ScanService, groups: readonly string[]): Promise<PrewarmSummary> {
  if (isRunning) {
    console.log('[Scheduler] Skipping: previous pre-warm still active');
    return { skipped: true, scanned: [], failed: [] };
  }

  isRunning = true;
  const scanned: string[] = [];
  const failed: string[] = [];
  try {
    console.log(`[Scheduler] Pre-warm at ${new Date().toUTCString()}: ${groups.join(', ')}`);
    const results = await Promise.allSettled(groups.map(asset => service.scanAsset(asset)));
    results.forEach((result, i) => {
      const asset = groups[i] ?? '?';
      if (result.status === 'fulfilled' && result.value.status === 'ok') {
        scanned.push(asset);
        return;
      }
      failed.push(asset);
      const reason =
        result.status === 'rejected'
          ? result.reason instanceof Error ? result.reason.message : String(result.reason)
          : result.value.status === 'unknown_group' ? result.value.message : 'unknown';
      console.error(`[Scheduler] Pre-warm ${asset} failed: ${reason}`);
    });
  } finally {
    isRunning = false;
  }
  return { skipped: false, scanned, failed };
}

/**
 * Start the pre-warm cron. Returns null when `expression` is empty.
 * Throws on an invalid expression so a bad deploy fails at boot.
 */
export function startScheduler(
  service: ScanService,
  expression: string,
  groups: readonly string[],
): ScheduledTask | null {
  if (!expression.trim()) {
    console.log('[Scheduler] Pre-warm disabled (PREWARM_CRON not set)');
    return null;
  }
  if (!cron.validate(expression)) {
    throw new Error(`Invalid PREWARM_CRON expression: "${expression}"`);
  }

  const task = cron.schedule(
    expression,
    async () => {
      await runPrewarm(service, groups);
    },
    { timezone: 'UTC' },
  );
  console.log(`[Scheduler] Pre-warm cron: "${expression}" (UTC) for ${groups.join(', ')}`);
  return task;
}
