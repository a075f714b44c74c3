/**
 * FILE PURPOSE: BullMQ queue for bulk corpus seeding
 * WHY: Seeding hundreds of URLs one polite fetch at a time takes minutes;
 *      the HTTP request only enqueues and the worker crawls in the background.
 */

import { Queue } from 'bullmq';
import type { CorpusJobData } from './jobs.js';
import { parseRedisConnection } from './connection.js';

export const CORPUS_QUEUE_NAME = 'corpus-seeding';

export function createCorpusQueue(redisUrl?: string): Queue<CorpusJobData> {
  return new Queue<CorpusJobData>(CORPUS_QUEUE_NAME, {
    connection: parseRedisConnection(redisUrl),
    defaultJobOptions: {
      attempts: 3,
      backoff: { type: 'exponential', delay: 1000 },
      removeOnComplete: { count: 1000 },
      removeOnFail: { count: 5000 },
    },
  });
}

export function corpusJobId(url: string): string {
  return `index-url-${Buffer.from(url).toString('base64url')}`;
}

/** Enqueue one index-url job per distinct URL. Returns the number queued. */
export async function enqueueUrls(queue: Queue<CorpusJobData>, urls: readonly string[]): Promise<number> {
  const unique = [...new Set(urls)];
  if (unique.length === 0) return 0;
  await queue.addBulk(unique.map((url) => ({
    name: 'index-url',
    data: { type: 'index-url' as const, url },
    // One job per URL while it is waiting or running. BullMQ rejects ids containing ':'.
    opts: { jobId: corpusJobId(url) },
  })));
  return unique.length;
}
