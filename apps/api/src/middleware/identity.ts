/**
 * FILE PURPOSE: Derive the caller reference recorded with each submission
 *
 * HOW: x-api-key header → Bearer JWT `sub` claim → client IP.
 *      API keys are stored as a SHA-256 prefix so raw keys never reach the
 *      submissions table. JWT parsing is best-effort (no signature check).
 */

import { createHash } from 'node:crypto';

/** Minimal request interface: works with Node http or any object with headers. */
export interface RequestLike {
  headers: Record<string, string | string[] | undefined>;
  socket?: { remoteAddress?: string };
}

export interface UserContext {
  userRef: string;
  source: 'api_key' | 'jwt' | 'ip';
}

export function hashApiKey(apiKey: string): string {
  return createHash('sha256').update(apiKey).digest('hex').slice(0, 16);
}

export function createUserContext(req: RequestLike): UserContext {
  const apiKey = req.headers['x-api-key'];
  if (typeof apiKey === 'string' && apiKey.length > 0) {
    return { userRef: `key:${hashApiKey(apiKey)}`, source: 'api_key' };
  }

  const auth = req.headers['authorization'];
  if (typeof auth === 'string' && auth.startsWith('Bearer ')) {
    const payload = decodeJwtPayload(auth.slice(7));
    if (typeof payload?.sub === 'string') {
      return { userRef: `user:${payload.sub}`, source: 'jwt' };
    }
  }

  const forwarded = req.headers['x-forwarded-for'];
  const first = typeof forwarded === 'string' ? forwarded.split(',')[0]?.trim() : undefined;
  const ip = first || req.socket?.remoteAddress || 'unknown';
  return { userRef: `ip:${ip}`, source: 'ip' };
}

function decodeJwtPayload(token: string): Record<string, unknown> | null {
  const parts = token.split('.');
  if (parts.length !== 3 || !parts[1]) return null;
  try {
    const parsed: unknown = JSON.parse(Buffer.from(parts[1], 'base64url').toString('utf-8'));
    return typeof parsed === 'object' && parsed !== null ? { ...parsed } : null;
  } catch {
    return null;
  }
}
