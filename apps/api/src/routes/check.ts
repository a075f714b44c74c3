/**
 * FILE PURPOSE: Plagiarism check routes
 *
 * rateLimited: server-level; checkQuota is applied in app.ts before dispatch.
 *
 * Routes:
 *   POST /api/check          : JSON { text, options? }
 *   POST /api/check/upload   : raw file bytes, x-filename header, options in the query
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import type { CheckOptions } from '@textguard/similarity';
import { handleRouteError, headerValue, sendJson } from '../types.js';
import type { RouteContext } from '../types.js';

const NUMERIC_OPTIONS = ['maxPhrases', 'maxCandidateURLs', 'topK', 'budgetMs'] as const;
const BOOLEAN_OPTIONS = ['useSemantic', 'searchWeb'] as const;

/** Picks the recognised options out of a JSON object; the engine clamps ranges. */
export function parseCheckOptions(raw: unknown): CheckOptions {
  if (typeof raw !== 'object' || raw === null) return {};
  const source = new Map(Object.entries(raw));
  const options: CheckOptions = {};
  for (const key of NUMERIC_OPTIONS) {
    const value = source.get(key);
    if (typeof value === 'number' && Number.isFinite(value)) options[key] = value;
  }
  for (const key of BOOLEAN_OPTIONS) {
    const value = source.get(key);
    if (typeof value === 'boolean') options[key] = value;
  }
  return options;
}

/** Same options from query parameters (`?topK=3&useSemantic=true`). */
export function optionsFromQuery(params: URLSearchParams): CheckOptions {
  const raw: Record<string, number | boolean> = {};
  for (const key of NUMERIC_OPTIONS) {
    const value = params.get(key);
    if (value !== null && value.trim() !== '') raw[key] = Number(value);
  }
  for (const key of BOOLEAN_OPTIONS) {
    const value = params.get(key);
    if (value === 'true' || value === 'false') raw[key] = value === 'true';
  }
  return parseCheckOptions(raw);
}

export async function handleCheckRoutes(
  req: IncomingMessage,
  res: ServerResponse,
  url: string,
  ctx: RouteContext,
): Promise<void> {
  try {
    const parsedUrl = new URL(url, 'http://localhost');

    // POST /api/check/upload
    if (parsedUrl.pathname === '/api/check/upload' && req.method === 'POST') {
      const filename = headerValue(req, 'x-filename');
      if (!filename) {
        sendJson(res, 400, { error: 'Missing x-filename header' });
        return;
      }
      const body = await ctx.readRawBody(req, ctx.maxUploadBytes);
      if (body === null) {
        sendJson(res, 413, { error: `Upload exceeds ${ctx.maxUploadBytes} bytes` });
        return;
      }
      if (body.length === 0) {
        sendJson(res, 400, { error: 'Empty body' });
        return;
      }
      const report = await ctx.engine.checkDocument(
        body,
        filename,
        optionsFromQuery(parsedUrl.searchParams),
        ctx.user.userRef,
      );
      sendJson(res, 200, report);
      return;
    }

    // POST /api/check
    if (parsedUrl.pathname === '/api/check' && req.method === 'POST') {
      const body = await ctx.parseBody(req);
      if (typeof body.text !== 'string') {
        sendJson(res, 400, { error: 'Missing required field: text' });
        return;
      }
      const report = await ctx.engine.checkText(body.text, parseCheckOptions(body.options), ctx.user.userRef);
      sendJson(res, 200, report);
      return;
    }

    sendJson(res, 404, { error: 'Not found' });
  } catch (err) {
    handleRouteError(res, 'check', err);
  }
}
