/**
 * FILE PURPOSE: Fetch candidate pages through the TTL cache
 *
 * HOW: Per URL: fresh cache hit → done, no network. Otherwise robots check,
 *      bounded fetch, text extraction, minimum-length floor, cache write.
 *      Every network fetch attempt is followed by the politeness delay.
 *      Persisting the page into the store and index is the engine's job;
 *      this layer only returns outcomes.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { tokenize } from '../text/shingles.js';
import { fetchPage } from './fetcher.js';
import type { FetchFn, FetchFailureReason } from './fetcher.js';
import type { RobotsPolicy } from './robots.js';
import type { DiskPageCache } from './page-cache.js';
import { extractMainText } from './html-extract.js';
import { formatFromContentType, formatFromFilename } from '../parsing/document-parser.js';
import type { DocumentExtractor } from '../parsing/document-parser.js';

export type CrawlOutcome =
  | { kind: 'cached'; url: string; text: string; fetchedAt: number }
  | { kind: 'fetched'; url: string; text: string; fetchedAt: number }
  | { kind: 'blocked'; url: string }
  | { kind: 'failed'; url: string; reason: FetchFailureReason | 'unsupported-content' | 'extraction-failed'; message: string }
  | { kind: 'too-short'; url: string; words: number }
  | { kind: 'skipped'; url: string };

export interface CrawlStats {
  discovered: number;
  fetched: number;
  cached: number;
  blocked: number;
  failed: number;
  tooShort: number;
  skipped: number;
}

export function emptyCrawlStats(): CrawlStats {
  return { discovered: 0, fetched: 0, cached: 0, blocked: 0, failed: 0, tooShort: 0, skipped: 0 };
}

export function tallyOutcome(stats: CrawlStats, outcome: CrawlOutcome): void {
  switch (outcome.kind) {
    case 'cached': stats.cached++; break;
    case 'fetched': stats.fetched++; break;
    case 'blocked': stats.blocked++; break;
    case 'failed': stats.failed++; break;
    case 'too-short': stats.tooShort++; break;
    case 'skipped': stats.skipped++; break;
  }
}

export interface CrawlManagerOptions {
  cache: DiskPageCache;
  robots: RobotsPolicy;
  extractor: DocumentExtractor;
  userAgent: string;
  fetchTimeoutMs: number;
  minWords: number;
  delayMs: number;
  fetchImpl?: FetchFn;
  now?: () => number;
}

export class CrawlManager {
  private readonly now: () => number;

  constructor(private readonly options: CrawlManagerOptions) {
    this.now = options.now ?? Date.now;
  }

  get cache(): DiskPageCache {
    return this.options.cache;
  }

  /** Crawl URLs one after another, stopping once `signal` aborts. */
  async crawlAll(urls: readonly string[], signal?: AbortSignal): Promise<CrawlOutcome[]> {
    const outcomes: CrawlOutcome[] = [];
    for (const url of urls) {
      if (signal?.aborted) {
        outcomes.push({ kind: 'skipped', url });
        continue;
      }
      outcomes.push(await this.crawl(url, signal));
    }
    return outcomes;
  }

  async crawl(url: string, signal?: AbortSignal): Promise<CrawlOutcome> {
    const cached = await this.options.cache.lookup(url);
    if (cached.state === 'fresh') {
      return { kind: 'cached', url, text: cached.page.text, fetchedAt: cached.page.fetchedAt };
    }
    if (signal?.aborted) return { kind: 'skipped', url };

    if (!(await this.options.robots.isAllowed(url, signal))) {
      return signal?.aborted ? { kind: 'skipped', url } : { kind: 'blocked', url };
    }
    if (signal?.aborted) return { kind: 'skipped', url };

    const result = await fetchPage(url, {
      timeoutMs: this.options.fetchTimeoutMs,
      userAgent: this.options.userAgent,
      ...(signal ? { signal } : {}),
      ...(this.options.fetchImpl ? { fetchImpl: this.options.fetchImpl } : {}),
    });
    await this.politeDelay(signal);

    if (!result.ok) {
      if (result.reason === 'aborted') return { kind: 'skipped', url };
      process.stderr.write(`WARN: Fetch failed for ${url}: ${result.message}\n`);
      return { kind: 'failed', url, reason: result.reason, message: result.message };
    }

    const extracted = await this.extract(url, result.contentType, result.body);
    if (typeof extracted !== 'string') return { kind: 'failed', url, ...extracted };
    const text = extracted;

    const words = tokenize(text).length;
    if (words < this.options.minWords) return { kind: 'too-short', url, words };

    const fetchedAt = this.now();
    try {
      await this.options.cache.put(url, text, result.contentType, fetchedAt);
    } catch (err) {
      process.stderr.write(`WARN: Cache write failed for ${url}: ${err}\n`);
    }
    return { kind: 'fetched', url, text, fetchedAt };
  }

  private async extract(
    url: string,
    contentType: string,
    body: Buffer,
  ): Promise<string | { reason: 'unsupported-content' | 'extraction-failed'; message: string }> {
    const format = formatFromContentType(contentType)
      ?? formatFromFilename(new URL(url).pathname)
      ?? (contentType === '' ? 'html' : null);
    if (!format) {
      return { reason: 'unsupported-content', message: `Cannot extract text from ${contentType}` };
    }
    if (format === 'html') return extractMainText(body.toString('utf-8')).text;
    const extracted = await this.options.extractor.extractFormat(format, body, url);
    if (extracted.ok) return extracted.text;
    // Empty documents fall through to the length floor.
    if (extracted.reason === 'empty') return '';
    process.stderr.write(`WARN: Extraction failed for ${url}: ${extracted.message}\n`);
    return { reason: 'extraction-failed', message: extracted.message };
  }

  private async politeDelay(signal?: AbortSignal): Promise<void> {
    if (this.options.delayMs <= 0 || signal?.aborted) return;
    try {
      await sleep(this.options.delayMs, undefined, signal ? { signal } : undefined);
    } catch (err) {
      // Only an abort interrupts the delay.
      if (!signal?.aborted) throw err;
    }
  }
}
