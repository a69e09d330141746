import { vi } from 'vitest';

export interface FetchInit {
  headers?: Record<string, string>;
}

export const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

/** Replace global fetch with a router over the request URL. Unrouted URLs get a 404. */
export function stubFetch(route: (url: URL) => Response | undefined) {
  const fetchMock = vi.fn(async (input: string, _init?: FetchInit) => {
    return route(new URL(input)) ?? new Response('not found', { status: 404 });
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}
