/**
 * FILE PURPOSE: API authentication by API key, with an admin tier
 *
 * WHY: Checks are open to any key holder; corpus mutations change what every
 *      later check matches against, so they need the admin key as well.
 * HOW: x-api-key is checked against API_KEYS. Admin routes additionally
 *      require x-admin-key === ADMIN_API_KEY. With no API_KEYS configured,
 *      development runs open and production rejects every protected route.
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import { createUserContext } from './identity.js';
import type { UserContext } from './identity.js';

export type AuthTier = 'public' | 'user' | 'admin';

export interface AuthResult {
  userContext: UserContext;
  tier: AuthTier;
  authMethod: 'api-key' | 'none';
}

// ─── Route tier classification (data-driven) ───

interface RouteRule {
  prefix: string;
  methods?: string[];
  tier: AuthTier;
}

/** First match wins; more specific prefixes come first. */
const ROUTE_RULES: RouteRule[] = [
  { prefix: '/api/health', tier: 'public' },
  { prefix: '/api/corpus', methods: ['POST', 'DELETE'], tier: 'admin' },
];

export function getRequiredTier(url: string, method: string): AuthTier {
  const path = url.split('?')[0] ?? url;

  for (const rule of ROUTE_RULES) {
    if (path.startsWith(rule.prefix)) {
      if (!rule.methods || rule.methods.includes(method)) {
        return rule.tier;
      }
    }
  }

  if (path.startsWith('/api/')) return 'user';
  return 'public';
}

// ─── API key validation ───

let cachedApiKeys: Set<string> | null = null;

function getValidApiKeys(): Set<string> {
  if (cachedApiKeys) return cachedApiKeys;
  const raw = process.env.API_KEYS ?? '';
  cachedApiKeys = new Set(raw.split(',').map((k) => k.trim()).filter(Boolean));
  return cachedApiKeys;
}

/** For testing: clear the cached API keys so env changes take effect. */
export function clearApiKeyCache(): void {
  cachedApiKeys = null;
}

function isOpenMode(): boolean {
  return getValidApiKeys().size === 0 && process.env.NODE_ENV !== 'production';
}

function isValidAdminKey(req: IncomingMessage): boolean {
  const adminKey = process.env.ADMIN_API_KEY;
  const provided = req.headers['x-admin-key'];
  if (!adminKey) return false;
  return typeof provided === 'string' && provided === adminKey;
}

function reject(res: ServerResponse, status: number, error: string): null {
  res.statusCode = status;
  res.end(JSON.stringify({ error }));
  return null;
}

/**
 * Authenticate the request. Returns AuthResult on success, null on failure
 * (401/403 response already sent).
 */
export function authenticateRequest(
  req: IncomingMessage,
  res: ServerResponse,
  url: string,
): AuthResult | null {
  const tier = getRequiredTier(url, req.method ?? 'GET');
  const userContext = createUserContext(req);

  if (tier === 'public') {
    return { userContext, tier, authMethod: 'none' };
  }

  const apiKey = req.headers['x-api-key'];
  const hasKey = typeof apiKey === 'string' && apiKey.length > 0;
  const keys = getValidApiKeys();

  if (!isOpenMode()) {
    if (!hasKey) return reject(res, 401, 'Authentication required: provide x-api-key header');
    if (!keys.has(apiKey)) return reject(res, 401, 'Authentication failed: invalid API key');
  }

  if (tier === 'admin' && !isOpenMode() && !isValidAdminKey(req)) {
    return reject(res, 403, 'Forbidden: admin access required (x-admin-key)');
  }

  return { userContext, tier, authMethod: hasKey ? 'api-key' : 'none' };
}
