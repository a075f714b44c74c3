/**
 * FILE PURPOSE: Web search for candidate source URLs
 *
 * WHY: Fresh sources are found through a search engine; the local index
 *      only knows what it has seen. Search is slow and rate-limited, so it
 *      runs under a hard wall-clock deadline and degrades to configured
 *      seed URLs instead of failing the check.
 *
 * HOW: Serper (Google results) when SERPER_API_KEY is set, DuckDuckGo's
 *      HTML endpoint when explicitly selected. All phrase searches run
 *      concurrently; whatever arrived before the deadline is kept.
 */

import * as cheerio from 'cheerio';
import { extractPhrases } from './phrases.js';
import type { FetchFn } from '../crawl/fetcher.js';

export interface SearchProvider {
  readonly name: string;
  search(query: string, limit: number, signal: AbortSignal): Promise<string[]>;
}

function isHttpUrl(value: string): boolean {
  return value.startsWith('http://') || value.startsWith('https://');
}

export class SerperSearchProvider implements SearchProvider {
  readonly name = 'serper';

  constructor(
    private readonly apiKey: string,
    private readonly fetchImpl: FetchFn = fetch,
    private readonly endpoint = 'https://google.serper.dev/search',
  ) {}

  async search(query: string, limit: number, signal: AbortSignal): Promise<string[]> {
    const response = await this.fetchImpl(this.endpoint, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'X-API-KEY': this.apiKey,
      },
      body: JSON.stringify({ q: `"${query.replace(/"/g, '')}"`, num: limit }),
      signal,
    });
    if (!response.ok) throw new Error(`Serper returned ${response.status}`);

    const payload = await response.json() as { organic?: Array<{ link?: unknown }> };
    return (payload.organic ?? [])
      .map((item) => (typeof item.link === 'string' ? item.link : ''))
      .filter(isHttpUrl)
      .slice(0, limit);
  }
}

/** DuckDuckGo wraps result links in a redirect carrying the target in `uddg`. */
export function resolveDuckDuckGoHref(href: string): string {
  const candidate = href.startsWith('//')
    ? `https:${href}`
    : href.startsWith('/') ? `https://duckduckgo.com${href}` : href;
  try {
    const parsed = new URL(candidate);
    if (parsed.hostname.endsWith('duckduckgo.com')) {
      const target = parsed.searchParams.get('uddg');
      if (target) return target;
    }
    return parsed.toString();
  } catch {
    return href;
  }
}

export class DuckDuckGoSearchProvider implements SearchProvider {
  readonly name = 'duckduckgo';

  constructor(
    private readonly fetchImpl: FetchFn = fetch,
    private readonly userAgent = 'Mozilla/5.0 (compatible; TextGuardBot/1.0)',
  ) {}

  async search(query: string, limit: number, signal: AbortSignal): Promise<string[]> {
    const q = `"${query.replace(/"/g, '')}"`;
    const response = await this.fetchImpl(`https://html.duckduckgo.com/html/?q=${encodeURIComponent(q)}`, {
      method: 'GET',
      headers: { Accept: 'text/html', 'User-Agent': this.userAgent },
      signal,
    });
    if (!response.ok) throw new Error(`DuckDuckGo returned ${response.status}`);

    const $ = cheerio.load(await response.text());
    const urls: string[] = [];
    $('a.result__a').each((_, el) => {
      const href = $(el).attr('href');
      if (!href || urls.length >= limit) return;
      const target = resolveDuckDuckGoHref(href);
      if (isHttpUrl(target)) urls.push(target);
    });
    return urls;
  }
}

export type SearchProviderName = 'serper' | 'duckduckgo' | 'none';

export function createSearchProvider(
  settings: { provider: SearchProviderName | 'auto'; serperApiKey?: string; userAgent?: string },
  fetchImpl: FetchFn = fetch,
): SearchProvider | null {
  const wanted = settings.provider;
  if (wanted === 'none') return null;
  if ((wanted === 'auto' || wanted === 'serper') && settings.serperApiKey) {
    return new SerperSearchProvider(settings.serperApiKey, fetchImpl);
  }
  if (wanted === 'duckduckgo') return new DuckDuckGoSearchProvider(fetchImpl, settings.userAgent);
  if (wanted === 'serper') {
    process.stderr.write('WARN: SEARCH_PROVIDER=serper but SERPER_API_KEY is not set; web search disabled\n');
  }
  return null;
}

// ─── Discovery ───

export interface DiscoveryOptions {
  maxPhrases: number;
  maxUrls: number;
  timeoutMs: number;
  fallbackSeeds: readonly string[];
  resultsPerPhrase?: number;
  signal?: AbortSignal;
}

export interface DiscoveryResult {
  urls: string[];
  phrases: string[];
  fallback: boolean;
  reason?: string;
}

export async function discoverCandidates(
  text: string,
  provider: SearchProvider | null,
  options: DiscoveryOptions,
): Promise<DiscoveryResult> {
  const phrases = extractPhrases(text, options.maxPhrases);
  const collected = new Set<string>();

  const finish = (fallback: boolean, reason?: string): DiscoveryResult => {
    const urls = [...collected];
    if (fallback) urls.push(...options.fallbackSeeds);
    const unique = [...new Set(urls)].slice(0, Math.max(0, options.maxUrls));
    return reason === undefined
      ? { urls: unique, phrases, fallback }
      : { urls: unique, phrases, fallback, reason };
  };

  if (!provider) return finish(true, 'no search provider configured');
  if (phrases.length === 0) return finish(false);
  if (options.signal?.aborted) return finish(true, 'request budget exhausted');

  const controller = new AbortController();
  const onAbort = () => controller.abort();
  options.signal?.addEventListener('abort', onAbort, { once: true });
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<'timeout'>((resolve) => {
    timer = setTimeout(() => resolve('timeout'), options.timeoutMs);
  });

  const perPhrase = options.resultsPerPhrase ?? Math.max(3, Math.ceil(options.maxUrls / phrases.length));
  const searches = Promise.allSettled(phrases.map(async (phrase) => {
    const urls = await provider.search(phrase, perPhrase, controller.signal);
    if (controller.signal.aborted) return;
    for (const url of urls) collected.add(url);
  }));

  try {
    const outcome = await Promise.race([searches, deadline]);
    if (outcome === 'timeout') {
      process.stderr.write(`WARN: ${provider.name} search exceeded ${options.timeoutMs}ms; using ${collected.size} collected URLs plus fallback seeds\n`);
      return finish(true, 'search timed out');
    }
    if (options.signal?.aborted) return finish(true, 'request budget exhausted');
    const failures = outcome.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
    if (failures.length === outcome.length) {
      process.stderr.write(`WARN: ${provider.name} search failed: ${failures[0]?.reason}\n`);
      return finish(true, 'search provider failed');
    }
    if (failures.length > 0) {
      process.stderr.write(`WARN: ${failures.length}/${outcome.length} ${provider.name} searches failed\n`);
    }
    return finish(false);
  } finally {
    clearTimeout(timer);
    controller.abort();
    options.signal?.removeEventListener('abort', onAbort);
  }
}
