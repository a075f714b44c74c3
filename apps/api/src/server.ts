/**
 * FILE PURPOSE: API server entry point with engine lifecycle and graceful shutdown
 *
 * HOW: Builds the engine over the PostgreSQL store, loads or rebuilds the
 *      index before listening, runs the corpus worker in this process so it
 *      writes to the same index the check routes read, and closes everything
 *      in order on SIGTERM/SIGINT.
 */

import * as Sentry from '@sentry/node';
import { createServer } from 'node:http';
import type { Queue, Worker } from 'bullmq';
import {
  IndexSnapshotError,
  PlagiarismEngine,
  createCorpusQueue,
  createCorpusWorker,
  enqueueUrls,
  loadEngineConfig,
} from '@textguard/similarity';
import type { CorpusJobData, CorpusJobResult } from '@textguard/similarity';
import { createRequestHandler, getAllowedOrigins, DEFAULT_MAX_UPLOAD_BYTES } from './app.js';
import { shutdownRedis } from './rate-limiter.js';
import type { UrlEnqueuer } from './types.js';
import { db, closeDatabase } from './db/index.js';
import { DrizzleStore } from './services/drizzle-store.js';

// Sentry: no-op when DSN not set
const sentryDsn = process.env.SENTRY_DSN;
if (sentryDsn) {
  Sentry.init({
    dsn: sentryDsn,
    environment: process.env.NODE_ENV ?? 'production',
    tracesSampleRate: 0.2,
    sendDefaultPii: false,
  });
}

const PORT = parseInt(process.env.PORT ?? '3002', 10);
const WORKER_CONCURRENCY = parseInt(process.env.WORKER_CONCURRENCY ?? '2', 10);
const MAX_UPLOAD_BYTES = parseInt(process.env.MAX_UPLOAD_BYTES ?? String(DEFAULT_MAX_UPLOAD_BYTES), 10);

async function main(): Promise<void> {
  const engine = new PlagiarismEngine({
    config: loadEngineConfig(),
    store: new DrizzleStore(db, closeDatabase),
  });

  try {
    await engine.init();
  } catch (err) {
    if (err instanceof IndexSnapshotError) {
      process.stderr.write(`FATAL: ${err.message}\n`);
      await closeDatabase();
      process.exit(1);
    }
    throw err;
  }
  process.stdout.write(`Index ready: ${engine.stats().documents} documents\n`);

  // ─── Corpus seeding queue (optional; needs Redis) ───
  let queue: Queue<CorpusJobData> | null = null;
  let worker: Worker<CorpusJobData, CorpusJobResult> | null = null;
  let enqueue: UrlEnqueuer | null = null;
  const redisUrl = process.env.REDIS_URL;
  if (redisUrl) {
    const corpusQueue = createCorpusQueue(redisUrl);
    queue = corpusQueue;
    enqueue = (urls) => enqueueUrls(corpusQueue, urls);
    worker = createCorpusWorker(engine, redisUrl, WORKER_CONCURRENCY);
    worker.on('failed', (job, err) => {
      process.stderr.write(`WARN: Corpus job ${job?.id ?? 'unknown'} failed: ${err.message}\n`);
    });
  } else {
    process.stderr.write('WARN: REDIS_URL not set; POST /api/corpus/urls is disabled\n');
  }

  const handler = createRequestHandler({
    engine,
    enqueueUrls: enqueue,
    allowedOrigins: getAllowedOrigins(),
    maxUploadBytes: MAX_UPLOAD_BYTES,
  });

  const server = createServer((req, res) => {
    handler(req, res).catch((err: unknown) => {
      process.stderr.write(`ERROR: Unhandled request failure: ${err}\n`);
      Sentry.captureException(err);
      if (!res.writableEnded) {
        res.statusCode = 500;
        res.end(JSON.stringify({ error: 'Internal server error' }));
      }
    });
  });

  server.listen(PORT, () => {
    process.stdout.write(`API server running on port ${PORT}\n`);
  });

  // ─── Graceful shutdown: close all connections in order ───
  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    process.stdout.write(`${signal} received; shutting down gracefully\n`);

    const forceExitTimer = setTimeout(() => {
      process.stderr.write('WARN: Graceful shutdown timed out after 30s; forcing exit\n');
      process.exit(1);
    }, 30_000);
    forceExitTimer.unref();

    try {
      // 1. Stop accepting new connections
      await new Promise<void>((resolve) => {
        server.close(() => resolve());
      });
      process.stdout.write('  Server closed\n');

      // 2. Stop the worker, then the queue
      if (worker) await worker.close();
      if (queue) await queue.close();
      process.stdout.write('  Corpus queue closed\n');

      // 3. Close Redis
      await shutdownRedis();
      process.stdout.write('  Redis disconnected\n');

      // 4. Flush the index and close the database
      await engine.shutdown();
      process.stdout.write('  Index flushed, database disconnected\n');

      process.stdout.write('Shutdown complete\n');
      process.exit(0);
    } catch (err) {
      process.stderr.write(`ERROR during shutdown: ${err}\n`);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((err: unknown) => {
  process.stderr.write(`FATAL: API server failed to start: ${err}\n`);
  process.exit(1);
});
