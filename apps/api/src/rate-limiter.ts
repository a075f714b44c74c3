/**
 * FILE PURPOSE: Per-caller daily check quota backed by Redis
 *
 * WHY: Each check may run web searches and crawl up to a dozen pages, so an
 *      unbounded caller costs search credits and goodwill with crawled sites.
 *
 * HOW: One counter per caller per 24h window (INCR + EXPIRE in a pipeline).
 *      Production: fail-CLOSED when Redis is unavailable.
 *      Development: fail-open for local dev without Redis.
 */

import { Redis } from 'ioredis';

const DEFAULT_DAILY_CHECK_LIMIT = 200;
const WINDOW_SECONDS = 86_400;
const KEY_PREFIX = 'quota:checks:';

let redis: Redis | null = null;

function getRedis(): Redis | null {
  if (redis) return redis;

  const url = process.env.REDIS_URL;
  if (!url) return null;

  redis = new Redis(url, {
    maxRetriesPerRequest: 1,
    retryStrategy(times: number) {
      if (times > 3) return null;
      return Math.min(times * 200, 1000);
    },
    lazyConnect: true,
  });

  // Connection errors surface per call in checkQuota
  redis.on('error', (err: Error) => {
    process.stderr.write(`WARN: Redis connection error: ${err.message}\n`);
  });

  return redis;
}

function dailyLimit(): number {
  const parsed = parseInt(process.env.DAILY_CHECK_LIMIT ?? '', 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : DEFAULT_DAILY_CHECK_LIMIT;
}

export interface QuotaResult {
  allowed: boolean;
  remaining: number;
  limit: number;
}

function unavailable(limit: number, reason: string): QuotaResult {
  if (process.env.NODE_ENV === 'production') {
    process.stderr.write(`WARN: ${reason} in production; blocking request (fail-closed)\n`);
    return { allowed: false, remaining: 0, limit };
  }
  return { allowed: true, remaining: limit, limit };
}

/**
 * Check whether the caller has checks left today. Consumes `units` when allowed.
 */
export async function checkQuota(userRef: string, units = 1): Promise<QuotaResult> {
  const limit = dailyLimit();
  const client = getRedis();
  if (!client) return unavailable(limit, 'Redis unavailable');

  const key = `${KEY_PREFIX}${userRef}`;

  try {
    const current = await client.get(key);
    const used = current ? parseInt(current, 10) : 0;
    const remaining = limit - used;

    if (units > remaining) {
      return { allowed: false, remaining: Math.max(0, remaining), limit };
    }

    const pipeline = client.pipeline();
    pipeline.incrby(key, units);
    pipeline.expire(key, WINDOW_SECONDS);
    await pipeline.exec();

    return { allowed: true, remaining: Math.max(0, remaining - units), limit };
  } catch (err) {
    process.stderr.write(`WARN: Quota check failed: ${err}\n`);
    return unavailable(limit, 'Redis error');
  }
}

/** Disconnect Redis gracefully. Call during server shutdown. */
export async function shutdownRedis(): Promise<void> {
  if (redis) {
    try {
      await redis.quit();
    } catch (err) {
      process.stderr.write(`WARN: Error closing Redis connection: ${err}\n`);
    }
    redis = null;
  }
}
