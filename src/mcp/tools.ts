import type { ScanService } from '../pipeline/scan-service.js';
import { toWireOutcome, toWireReport } from '../server/serialize.js';

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

function text(data: unknown, isError = false): ToolResult {
  const result: ToolResult = { content: [{ type: 'text', text: JSON.stringify(data) }] };
  if (isError) result.isError = true;
  return result;
}

export function listAssetGroups(service: ScanService): ToolResult {
  return text({ groups: service.listGroups() });
}

export async function scanAsset(
  service: ScanService,
  args: { asset: string; sort_by_open_interest?: boolean },
): Promise<ToolResult> {
  const result = await service.scanAsset(args.asset, args.sort_by_open_interest ? 'open_interest' : 'none');
  if (result.status === 'unknown_group') {
    return text({ error: result.message }, true);
  }
  return text(toWireReport(result.report));
}

export async function scanSingleTicker(service: ScanService, args: { ticker: string }): Promise<ToolResult> {
  const outcome = await service.scanTicker(args.ticker);
  return text(toWireOutcome(outcome));
}
