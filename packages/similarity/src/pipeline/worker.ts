/**
 * FILE PURPOSE: BullMQ worker that feeds seeding jobs to the engine
 * WHY: The worker runs inside the API process so the engine it writes to is
 *      the same authoritative index the check routes read.
 */

import { Worker } from 'bullmq';
import type { Job } from 'bullmq';
import type { CorpusJobData } from './jobs.js';
import { CorpusJobType } from './jobs.js';
import { CORPUS_QUEUE_NAME } from './queue.js';
import { parseRedisConnection } from './connection.js';
import type { IndexUrlResult, PlagiarismEngine } from '../engine/plagiarism-engine.js';

export interface CorpusJobResult {
  type: typeof CorpusJobType.INDEX_URL;
  url: string;
  result: IndexUrlResult;
}

export async function processCorpusJob(
  engine: PlagiarismEngine,
  job: Job<CorpusJobData>,
): Promise<CorpusJobResult> {
  const data = job.data;
  if (data.type !== CorpusJobType.INDEX_URL) {
    throw new Error(`Unknown corpus job type: ${JSON.stringify(job.data)}`);
  }
  const result = await engine.indexUrl(data.url);
  await job.log(`index-url ${data.url}: ${result.outcome}${'docId' in result ? ` (${result.docId})` : ''}`);
  return { type: CorpusJobType.INDEX_URL, url: data.url, result };
}

export function createCorpusWorker(
  engine: PlagiarismEngine,
  redisUrl?: string,
  concurrency = 2,
): Worker<CorpusJobData, CorpusJobResult> {
  return new Worker<CorpusJobData, CorpusJobResult>(
    CORPUS_QUEUE_NAME,
    (job) => processCorpusJob(engine, job),
    {
      connection: parseRedisConnection(redisUrl),
      concurrency,
    },
  );
}
