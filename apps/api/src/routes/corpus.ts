/**
 * FILE PURPOSE: Corpus management routes
 *
 * Routes:
 *   POST   /api/corpus          : JSON { label, text }, add or replace a document
 *   POST   /api/corpus/upload   : raw file bytes, x-filename and x-document-label headers
 *   POST   /api/corpus/urls     : JSON { urls }, queue pages for background crawling
 *   GET    /api/corpus          : ?limit=20&offset=0, newest first
 *   DELETE /api/corpus          : remove every page and empty the index
 *
 * POST and DELETE require the admin tier (see middleware/auth.ts).
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import { handleRouteError, headerValue, sendJson } from '../types.js';
import type { RouteContext, UrlEnqueuer } from '../types.js';

const MAX_URLS_PER_REQUEST = 500;

export interface CorpusRouteContext extends RouteContext {
  /** null when no queue is configured (REDIS_URL unset). */
  enqueueUrls: UrlEnqueuer | null;
}

function isHttpUrl(value: string): boolean {
  try {
    const parsed = new URL(value);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
}

function intParam(params: URLSearchParams, name: string, fallback: number): number {
  const parsed = parseInt(params.get(name) ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export async function handleCorpusRoutes(
  req: IncomingMessage,
  res: ServerResponse,
  url: string,
  ctx: CorpusRouteContext,
): Promise<void> {
  try {
    const parsedUrl = new URL(url, 'http://localhost');
    const path = parsedUrl.pathname;

    // POST /api/corpus/upload
    if (path === '/api/corpus/upload' && req.method === 'POST') {
      const filename = headerValue(req, 'x-filename');
      if (!filename) {
        sendJson(res, 400, { error: 'Missing x-filename header' });
        return;
      }
      const label = headerValue(req, 'x-document-label') ?? filename;
      const body = await ctx.readRawBody(req, ctx.maxUploadBytes);
      if (body === null) {
        sendJson(res, 413, { error: `Upload exceeds ${ctx.maxUploadBytes} bytes` });
        return;
      }
      if (body.length === 0) {
        sendJson(res, 400, { error: 'Empty body' });
        return;
      }
      const docId = await ctx.engine.indexDocument(body, label, filename);
      sendJson(res, 201, { docId, label });
      return;
    }

    // POST /api/corpus/urls
    if (path === '/api/corpus/urls' && req.method === 'POST') {
      if (!ctx.enqueueUrls) {
        sendJson(res, 503, { error: 'Corpus queue unavailable: REDIS_URL is not configured' });
        return;
      }
      const body = await ctx.parseBody(req);
      const urls = Array.isArray(body.urls) ? body.urls : null;
      if (!urls || urls.length === 0) {
        sendJson(res, 400, { error: 'Missing required field: urls (non-empty array)' });
        return;
      }
      if (urls.length > MAX_URLS_PER_REQUEST) {
        sendJson(res, 400, { error: `At most ${MAX_URLS_PER_REQUEST} URLs per request` });
        return;
      }
      const valid: string[] = [];
      const rejected: unknown[] = [];
      for (const u of urls) {
        if (typeof u === 'string' && isHttpUrl(u)) valid.push(u);
        else rejected.push(u);
      }
      const queued = await ctx.enqueueUrls(valid);
      sendJson(res, 202, { queued, rejected });
      return;
    }

    if (path !== '/api/corpus') {
      sendJson(res, 404, { error: 'Not found' });
      return;
    }

    // POST /api/corpus
    if (req.method === 'POST') {
      const body = await ctx.parseBody(req);
      if (typeof body.label !== 'string' || typeof body.text !== 'string') {
        sendJson(res, 400, { error: 'Missing required fields: label, text' });
        return;
      }
      const docId = await ctx.engine.indexDocument(body.text, body.label);
      sendJson(res, 201, { docId, label: body.label.trim() });
      return;
    }

    // GET /api/corpus
    if (req.method === 'GET') {
      const limit = intParam(parsedUrl.searchParams, 'limit', 20);
      const offset = intParam(parsedUrl.searchParams, 'offset', 0);
      const pages = await ctx.engine.listCorpus(limit, offset);
      sendJson(res, 200, { documents: ctx.engine.stats().documents, pages });
      return;
    }

    // DELETE /api/corpus
    if (req.method === 'DELETE') {
      const { pagesRemoved } = await ctx.engine.clearCorpus();
      sendJson(res, 200, { cleared: true, pagesRemoved });
      return;
    }

    sendJson(res, 405, { error: 'Method not allowed' });
  } catch (err) {
    handleRouteError(res, 'corpus', err);
  }
}
