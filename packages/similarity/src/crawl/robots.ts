/**
 * FILE PURPOSE: robots.txt exclusion checks for the crawler
 *
 * HOW: One robots.txt fetch per origin, cached with a TTL and shared by
 *      concurrent callers. The fetch runs on its own timeout; each caller
 *      waits on it under its own budget. Rules come from the groups naming our product
 *      token, else the `*` group. The longest matching pattern decides;
 *      on a tie Allow wins. `*` matches any run and a trailing `$` anchors.
 *
 * Status policy: 2xx → parsed rules; 401/403 → everything disallowed;
 * other 4xx → everything allowed; 5xx, timeout or network error →
 * everything disallowed until the entry expires.
 */

import { fetchPage } from './fetcher.js';
import type { FetchFn } from './fetcher.js';

export interface RobotsRule {
  allow: boolean;
  pattern: string;
}

interface RobotsGroup {
  agents: string[];
  rules: RobotsRule[];
}

export type RobotsRules =
  | { kind: 'allow-all' }
  | { kind: 'disallow-all' }
  | { kind: 'rules'; rules: RobotsRule[] };

export function parseRobots(text: string, productToken: string): RobotsRules {
  const groups: RobotsGroup[] = [];
  let current: RobotsGroup | null = null;
  let lastWasAgent = false;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.replace(/#.*$/, '').trim();
    const sep = line.indexOf(':');
    if (sep <= 0) continue;
    const key = line.slice(0, sep).trim().toLowerCase();
    const value = line.slice(sep + 1).trim();

    if (key === 'user-agent') {
      if (!current || !lastWasAgent) {
        current = { agents: [], rules: [] };
        groups.push(current);
      }
      current.agents.push(value.toLowerCase());
      lastWasAgent = true;
      continue;
    }
    lastWasAgent = false;
    if (!current) continue;
    if (key === 'allow' || key === 'disallow') {
      // An empty Disallow allows everything; an empty Allow says nothing.
      if (value === '') continue;
      current.rules.push({ allow: key === 'allow', pattern: value });
    }
  }

  const token = productToken.toLowerCase();
  const named = groups.filter((g) => g.agents.some((a) => a !== '*' && token.includes(a)));
  const chosen = named.length > 0 ? named : groups.filter((g) => g.agents.includes('*'));
  const rules = chosen.flatMap((g) => g.rules);
  return rules.length === 0 ? { kind: 'allow-all' } : { kind: 'rules', rules };
}

function patternToRegExp(pattern: string): RegExp {
  const anchored = pattern.endsWith('$');
  const body = anchored ? pattern.slice(0, -1) : pattern;
  const source = body
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${source}${anchored ? '$' : ''}`);
}

/** Path plus query, e.g. `/a/b?x=1`. */
export function isPathAllowed(rules: RobotsRules, pathAndQuery: string): boolean {
  if (rules.kind === 'allow-all') return true;
  if (rules.kind === 'disallow-all') return false;
  if (pathAndQuery === '/robots.txt') return true;

  let best: RobotsRule | null = null;
  for (const rule of rules.rules) {
    if (!patternToRegExp(rule.pattern).test(pathAndQuery)) continue;
    if (
      !best
      || rule.pattern.length > best.pattern.length
      || (rule.pattern.length === best.pattern.length && rule.allow && !best.allow)
    ) {
      best = rule;
    }
  }
  return best ? best.allow : true;
}

/** Product token from a User-Agent string, e.g. "TextGuardBot/1.0 (+url)" → "TextGuardBot". */
export function productToken(userAgent: string): string {
  const first = userAgent.trim().split(/[\s/]/)[0];
  return first || userAgent;
}

export interface RobotsPolicyOptions {
  userAgent: string;
  timeoutMs: number;
  ttlMs: number;
  fetchImpl?: FetchFn;
  now?: () => number;
}

interface CachedRules {
  rules: Promise<RobotsRules>;
  expiresAt: number;
}

export class RobotsPolicy {
  private readonly cache = new Map<string, CachedRules>();
  private readonly now: () => number;

  constructor(private readonly options: RobotsPolicyOptions) {
    this.now = options.now ?? Date.now;
  }

  async isAllowed(url: string, signal?: AbortSignal): Promise<boolean> {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return false;
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') return false;
    if (signal?.aborted) return false;
    const rules = await raceSignal(this.rulesFor(parsed.origin), signal);
    // A caller whose own budget ran out gets no answer and fetches nothing.
    if (rules === null) return false;
    return isPathAllowed(rules, `${parsed.pathname}${parsed.search}`);
  }

  clear(): void {
    this.cache.clear();
  }

  /** Shared by every caller for the origin; bounded only by the robots timeout. */
  private rulesFor(origin: string): Promise<RobotsRules> {
    const hit = this.cache.get(origin);
    if (hit && hit.expiresAt > this.now()) return hit.rules;
    const rules = this.load(origin);
    this.cache.set(origin, { rules, expiresAt: this.now() + this.options.ttlMs });
    return rules;
  }

  private async load(origin: string): Promise<RobotsRules> {
    const result = await fetchPage(`${origin}/robots.txt`, {
      timeoutMs: this.options.timeoutMs,
      userAgent: this.options.userAgent,
      accept: 'text/plain',
      maxBytes: 512 * 1024,
      ...(this.options.fetchImpl ? { fetchImpl: this.options.fetchImpl } : {}),
    });

    if (result.ok) {
      return parseRobots(result.body.toString('utf-8'), productToken(this.options.userAgent));
    }
    if (result.reason === 'http-error' && result.status !== undefined) {
      if (result.status === 401 || result.status === 403) return { kind: 'disallow-all' };
      if (result.status >= 400 && result.status < 500) return { kind: 'allow-all' };
    }
    process.stderr.write(`WARN: robots.txt unavailable for ${origin} (${result.message}); treating as disallowed\n`);
    return { kind: 'disallow-all' };
  }
}

/** Resolves null as soon as the signal aborts; the shared promise keeps running. */
function raceSignal<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T | null> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.resolve(null);
  return new Promise<T | null>((resolve, reject) => {
    const onAbort = () => resolve(null);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}
