/**
 * FILE PURPOSE: HTTP request handler for the plagiarism API
 *
 * HOW: Native Node.js handler, no framework. CORS, health check, auth and
 *      the daily check quota run here, then the request is dispatched by path
 *      prefix. server.ts wires it to a live engine; tests call it directly.
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import type { PlagiarismEngine } from '@textguard/similarity';
import { authenticateRequest } from './middleware/auth.js';
import { checkQuota as redisCheckQuota } from './rate-limiter.js';
import type { QuotaResult } from './rate-limiter.js';
import { handleCheckRoutes } from './routes/check.js';
import { handleCorpusRoutes } from './routes/corpus.js';
import { handleReportRoutes } from './routes/reports.js';
import { sendJson } from './types.js';
import type { RouteContext, UrlEnqueuer } from './types.js';

export const DEFAULT_MAX_UPLOAD_BYTES = 20 * 1024 * 1024;

export interface AppDeps {
  engine: PlagiarismEngine;
  enqueueUrls: UrlEnqueuer | null;
  checkQuota?: (userRef: string) => Promise<QuotaResult>;
  /** null allows every origin. */
  allowedOrigins?: Set<string> | null;
  maxUploadBytes?: number;
  startedAt?: number;
}

/** Parse allowed origins from env var (comma-separated). */
export function getAllowedOrigins(raw = process.env.ALLOWED_ORIGINS): Set<string> | null {
  if (!raw) return null;
  return new Set(raw.split(',').map((o) => o.trim()).filter(Boolean));
}

/** Parse a JSON object body; anything else parses as {}. */
export function parseBody(req: IncomingMessage): Promise<Record<string, unknown>> {
  return new Promise((resolve) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      try {
        const parsed: unknown = JSON.parse(Buffer.concat(chunks).toString());
        resolve(typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed) ? { ...parsed } : {});
      } catch {
        resolve({});
      }
    });
    req.on('error', () => resolve({}));
  });
}

/** Collect the raw body. Resolves null once it grows past maxBytes. */
export function readRawBody(req: IncomingMessage, maxBytes: number): Promise<Buffer | null> {
  return new Promise((resolve) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let overflow = false;
    req.on('data', (chunk: Buffer) => {
      if (overflow) return;
      size += chunk.length;
      if (size > maxBytes) {
        overflow = true;
        chunks.length = 0;
        resolve(null);
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => {
      if (!overflow) resolve(Buffer.concat(chunks));
    });
    req.on('error', () => resolve(Buffer.alloc(0)));
  });
}

export function createRequestHandler(deps: AppDeps): (req: IncomingMessage, res: ServerResponse) => Promise<void> {
  const allowedOrigins = deps.allowedOrigins ?? null;
  const maxUploadBytes = deps.maxUploadBytes ?? DEFAULT_MAX_UPLOAD_BYTES;
  const checkQuota = deps.checkQuota ?? ((userRef: string) => redisCheckQuota(userRef));
  const startedAt = deps.startedAt ?? Date.now();

  return async (req, res) => {
    res.setHeader('Content-Type', 'application/json');

    // ─── CORS with origin restriction ───
    const requestOrigin = req.headers.origin;
    if (allowedOrigins && requestOrigin) {
      if (allowedOrigins.has(requestOrigin)) {
        res.setHeader('Access-Control-Allow-Origin', requestOrigin);
      }
    } else {
      res.setHeader('Access-Control-Allow-Origin', '*');
    }
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization, x-api-key, x-admin-key, x-filename, x-document-label');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');

    if (req.method === 'OPTIONS') {
      res.statusCode = 204;
      res.end();
      return;
    }

    const url = req.url ?? '';

    // ─── Health check (before auth; used by load balancers) ───
    if (url === '/api/health') {
      const dbOk = await deps.engine.ping();
      const stats = deps.engine.stats();
      sendJson(res, dbOk ? 200 : 503, {
        status: dbOk ? 'ok' : 'degraded',
        timestamp: new Date().toISOString(),
        uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
        services: { database: dbOk ? 'ok' : 'unreachable' },
        index: { documents: stats.documents, bands: stats.bands, rows: stats.rows, numPerm: stats.numPerm },
        fallbacks: stats.fallbacks.filter((f) => f.alertLevel !== 'ok'),
      });
      return;
    }

    const authResult = authenticateRequest(req, res, url);
    if (!authResult) return;

    const ctx: RouteContext = {
      engine: deps.engine,
      parseBody,
      readRawBody,
      user: authResult.userContext,
      maxUploadBytes,
    };

    // ─── Daily check quota ───
    if (url.startsWith('/api/check')) {
      const quota = await checkQuota(authResult.userContext.userRef);
      if (!quota.allowed) {
        sendJson(res, 429, {
          error: 'Daily check limit exceeded',
          daily_limit: quota.limit,
          remaining: quota.remaining,
        });
        return;
      }
      await handleCheckRoutes(req, res, url, ctx);
      return;
    }

    if (url.startsWith('/api/corpus')) {
      await handleCorpusRoutes(req, res, url, { ...ctx, enqueueUrls: deps.enqueueUrls });
      return;
    }

    if (url.startsWith('/api/reports') || url.startsWith('/api/submissions')) {
      await handleReportRoutes(req, res, url, ctx);
      return;
    }

    sendJson(res, 404, { error: 'Not found' });
  };
}
