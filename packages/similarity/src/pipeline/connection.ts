/**
 * FILE PURPOSE: Redis connection parsing shared by the corpus queue and worker
 */

export interface RedisConnectionOptions {
  host: string;
  port: number;
  password: string | undefined;
  tls: Record<string, never> | undefined;
}

export function parseRedisConnection(redisUrl?: string): RedisConnectionOptions {
  const url = redisUrl ?? process.env.REDIS_URL ?? 'redis://localhost:6379';
  const parsed = new URL(url);

  return {
    host: parsed.hostname,
    port: parseInt(parsed.port || '6379', 10),
    password: parsed.password || undefined,
    tls: parsed.protocol === 'rediss:' ? {} : undefined,
  };
}
