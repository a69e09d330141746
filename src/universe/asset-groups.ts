import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const __dirname = dirname(fileURLToPath(import.meta.url));

export const DEFAULT_ASSET_GROUPS_FILE = join(__dirname, '..', '..', 'data', 'asset-groups.json');

const assetGroupsSchema = z.record(z.string().min(1), z.array(z.string().min(1)));

export interface AssetGroup {
  asset: string;
  tickers: string[];
}

/** Asset name (e.g. BTC) → the exchange-traded products that track it. */
export class AssetGroups {
  private groups: Map<string, string[]>;

  constructor(groups: Record<string, readonly string[]>) {
    this.groups = new Map(
      Object.entries(groups).map(([asset, tickers]) => [
        asset.trim().toUpperCase(),
        [...new Set(tickers.map(t => t.trim().toUpperCase()).filter(t => t.length > 0))],
      ]),
    );
  }

  /** Tickers of a group (case-insensitive); empty for unknown groups. */
  tickers(asset: string): string[] {
    return [...(this.groups.get(asset.trim().toUpperCase()) ?? [])];
  }

  list(): AssetGroup[] {
    return [...this.groups.entries()].map(([asset, tickers]) => ({ asset, tickers: [...tickers] }));
  }
}

export function loadAssetGroups(file = DEFAULT_ASSET_GROUPS_FILE): AssetGroups {
  const raw: unknown = JSON.parse(readFileSync(file, 'utf8'));
  const parsed = assetGroupsSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join('\n  ');
    throw new Error(`Invalid asset groups file ${file}:\n  ${issues}`);
  }
  return new AssetGroups(parsed.data);
}
