/**
 * FILE PURPOSE: Shared types and error handling for API route handlers
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import * as Sentry from '@sentry/node';
import { isInputError } from '@textguard/similarity';
import type { PlagiarismEngine } from '@textguard/similarity';
import type { UserContext } from './middleware/identity.js';

export type BodyParser = (req: IncomingMessage) => Promise<Record<string, unknown>>;

export type RawBodyReader = (req: IncomingMessage, maxBytes: number) => Promise<Buffer | null>;

/** Enqueues URLs for background crawling; returns the number queued. */
export type UrlEnqueuer = (urls: readonly string[]) => Promise<number>;

export interface RouteContext {
  engine: PlagiarismEngine;
  parseBody: BodyParser;
  readRawBody: RawBodyReader;
  user: UserContext;
  maxUploadBytes: number;
}

/** Trimmed, URI-decoded string header, or null when absent or blank. */
export function headerValue(req: IncomingMessage, name: string): string | null {
  const value = req.headers[name];
  if (typeof value !== 'string' || value.trim() === '') return null;
  try {
    return decodeURIComponent(value.trim());
  } catch {
    return value.trim();
  }
}

export function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.statusCode = status;
  res.end(JSON.stringify(body));
}

/** Input errors answer 400 with their code; anything else is logged and answers 500. */
export function handleRouteError(res: ServerResponse, routeName: string, err: unknown): void {
  if (isInputError(err)) {
    if (!res.writableEnded) sendJson(res, 400, { error: err.message, code: err.code });
    return;
  }
  process.stderr.write(`ERROR in ${routeName} routes: ${err}\n`);
  Sentry.captureException(err);
  if (!res.writableEnded) {
    sendJson(res, 500, { error: 'Internal server error' });
  }
}
