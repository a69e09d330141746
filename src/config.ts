import { z } from 'zod';
import 'dotenv/config';

const optionalString = z
  .string()
  .optional()
  .transform(v => (v && v.trim().length > 0 ? v.trim() : undefined));

const configSchema = z
  .object({
    // App
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    CORS_ORIGINS: z.string().default('*'),

    // Market data
    MARKET_DATA_PROVIDER: z.enum(['polygon', 'alpaca']).default('polygon'),
    POLYGON_API_KEY: optionalString,
    POLYGON_BASE_URL: z.string().url().default('https://api.polygon.io'),
    ALPACA_API_KEY: optionalString,
    ALPACA_SECRET_KEY: optionalString,
    ALPACA_BASE_URL: z.string().url().default('https://paper-api.alpaca.markets'),
    ALPACA_DATA_URL: z.string().url().default('https://data.alpaca.markets'),
    HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),

    // Scan policy (with the defaults the strategy engine ships)
    EXPIRY_MIN_DAYS: z.coerce.number().int().nonnegative().default(20),
    EXPIRY_MAX_DAYS: z.coerce.number().int().nonnegative().default(40),
    ITM_COUNT: z.coerce.number().int().nonnegative().default(2),
    OTM_COUNT: z.coerce.number().int().nonnegative().default(5),
    SCAN_CONCURRENCY: z.coerce.number().int().min(1).default(4),

    // Cache + pre-warm
    SCAN_CACHE_TTL_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
    SCAN_CACHE_MAX_ENTRIES: z.coerce.number().int().min(1).default(16),
    PREWARM_CRON: z.string().default(''),
    PREWARM_GROUPS: z.string().default('BTC,ETH'),
    ASSET_GROUPS_FILE: optionalString,
  })
  .refine(c => c.EXPIRY_MIN_DAYS <= c.EXPIRY_MAX_DAYS, {
    message: 'must be greater than or equal to EXPIRY_MIN_DAYS',
    path: ['EXPIRY_MAX_DAYS'],
  });

type Config = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    const missing = result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join('\n  ');
    throw new Error(`Invalid configuration:\n  ${missing}`);
  }
  return result.data;
}

/** Splits a comma-separated env value into trimmed, non-empty, upper-cased entries. */
export function parseGroupList(value: string): string[] {
  return value
    .split(',')
    .map(s => s.trim().toUpperCase())
    .filter(s => s.length > 0);
}

export const config = loadConfig();
export type { Config };
