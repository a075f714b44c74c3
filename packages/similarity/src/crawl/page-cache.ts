/**
 * FILE PURPOSE: On-disk TTL cache of extracted page text
 *
 * HOW: One JSON file per URL named by SHA-256 of the URL. The entry's own
 *      `fetchedAt` (ms) drives freshness: fresh while now - fetchedAt < ttl.
 *      Stale entries stay on disk until the next fetch replaces them.
 *      Writes and clear() are serialized; each write is temp-file + rename
 *      so readers never see half an entry.
 */

import { createHash } from 'node:crypto';
import { mkdir, readFile, readdir, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Mutex } from '../concurrency/rw-lock.js';

export interface CachedPage {
  url: string;
  text: string;
  contentType: string;
  fetchedAt: number;
}

export type CacheLookup =
  | { state: 'miss' }
  | { state: 'fresh'; page: CachedPage }
  | { state: 'stale'; page: CachedPage };

export const DEFAULT_CACHE_TTL_MS = 24 * 60 * 60 * 1000;

function isCachedPage(value: unknown): value is CachedPage {
  if (typeof value !== 'object' || value === null) return false;
  return 'url' in value && typeof value.url === 'string'
    && 'text' in value && typeof value.text === 'string'
    && 'contentType' in value && typeof value.contentType === 'string'
    && 'fetchedAt' in value && typeof value.fetchedAt === 'number';
}

export function cacheKey(url: string): string {
  return createHash('sha256').update(url).digest('hex');
}

export class DiskPageCache {
  private readonly mutex = new Mutex();
  private readonly now: () => number;
  private tmpCounter = 0;

  constructor(
    readonly dir: string,
    readonly ttlMs = DEFAULT_CACHE_TTL_MS,
    now?: () => number,
  ) {
    this.now = now ?? Date.now;
  }

  pathFor(url: string): string {
    return join(this.dir, `${cacheKey(url)}.json`);
  }

  async lookup(url: string): Promise<CacheLookup> {
    let raw: string;
    try {
      raw = await readFile(this.pathFor(url), 'utf-8');
    } catch {
      return { state: 'miss' };
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      process.stderr.write(`WARN: Ignoring unreadable cache entry for ${url}: ${err}\n`);
      return { state: 'miss' };
    }
    if (!isCachedPage(parsed) || parsed.url !== url) return { state: 'miss' };
    const age = this.now() - parsed.fetchedAt;
    return age < this.ttlMs ? { state: 'fresh', page: parsed } : { state: 'stale', page: parsed };
  }

  async put(url: string, text: string, contentType: string, fetchedAt = this.now()): Promise<CachedPage> {
    const page: CachedPage = { url, text, contentType, fetchedAt };
    await this.mutex.run(async () => {
      await mkdir(this.dir, { recursive: true });
      const target = this.pathFor(url);
      const tmp = `${target}.${process.pid}.${++this.tmpCounter}.tmp`;
      await writeFile(tmp, JSON.stringify(page), 'utf-8');
      await rename(tmp, target);
    });
    return page;
  }

  /** Remove every entry. Returns how many were removed. */
  async clear(): Promise<number> {
    return this.mutex.run(async () => {
      let names: string[];
      try {
        names = await readdir(this.dir);
      } catch {
        return 0;
      }
      const entries = names.filter((n) => n.endsWith('.json'));
      await Promise.all(entries.map((n) => rm(join(this.dir, n), { force: true })));
      return entries.length;
    });
  }
}
