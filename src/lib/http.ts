import { MarketDataError } from '../providers/errors.js';

export interface JsonRequest {
  provider: string;
  url: URL | string;
  headers?: Record<string, string>;
  timeoutMs: number;
}

/** GET a JSON document, raising MarketDataError on timeout, non-2xx or a bad body. */
export async function fetchJson<T>({ provider, url, headers, timeoutMs }: JsonRequest): Promise<T> {
  let res: Response;
  try {
    res = await fetch(url.toString(), {
      headers: { Accept: 'application/json', ...headers },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MarketDataError(provider, `request failed: ${reason}`);
  }

  if (!res.ok) {
    const text = await res.text().catch(() => '');
    throw new MarketDataError(provider, `API error ${res.status}${text ? `: ${text}` : ''}`, res.status);
  }

  try {
    return (await res.json()) as T;
  } catch {
    throw new MarketDataError(provider, 'response body is not valid JSON', res.status);
  }
}

export function coerceNumber(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}
