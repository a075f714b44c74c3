import { vi } from 'vitest';
import type { FetchFn } from '../../src/crawl/fetcher.js';

export type Route = (init?: RequestInit) => Response | Promise<Response>;

export function requestUrl(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  return input instanceof URL ? input.href : input.url;
}

/** fetch stand-in answering by exact URL; anything else is a 404. */
export function routeFetch(routes: Record<string, Route>) {
  return vi.fn<FetchFn>(async (input, init) => {
    const route = routes[requestUrl(input)];
    return route ? route(init) : new Response('not found', { status: 404 });
  });
}

export function html(body: string, status = 200): Response {
  return new Response(body, { status, headers: { 'content-type': 'text/html; charset=utf-8' } });
}

/** Never answers; rejects once the request signal aborts. */
export const hang: Route = (init) => new Promise<Response>((_, reject) => {
  init?.signal?.addEventListener('abort', () => reject(new Error('The operation was aborted')));
});
