/**
 * FILE PURPOSE: Read-only audit routes for past checks
 *
 * Routes:
 *   GET /api/reports/:id       : stored report (matches of one submission)
 *   GET /api/submissions       : ?limit=20, newest first, text omitted
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import { handleRouteError, sendJson } from '../types.js';
import type { RouteContext } from '../types.js';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export async function handleReportRoutes(
  req: IncomingMessage,
  res: ServerResponse,
  url: string,
  ctx: RouteContext,
): Promise<void> {
  try {
    const parsedUrl = new URL(url, 'http://localhost');

    if (req.method !== 'GET') {
      sendJson(res, 405, { error: 'Method not allowed' });
      return;
    }

    const idMatch = parsedUrl.pathname.match(/^\/api\/reports\/([^/]+)$/);
    if (idMatch) {
      const id = idMatch[1] ?? '';
      // Ids are UUIDs; anything else cannot exist
      const report = UUID_PATTERN.test(id) ? await ctx.engine.getReport(id) : null;
      if (!report) {
        sendJson(res, 404, { error: 'Report not found' });
        return;
      }
      sendJson(res, 200, report);
      return;
    }

    if (parsedUrl.pathname === '/api/submissions') {
      const parsed = parseInt(parsedUrl.searchParams.get('limit') ?? '', 10);
      const submissions = await ctx.engine.listSubmissions(Number.isNaN(parsed) ? 20 : parsed);
      sendJson(res, 200, { submissions });
      return;
    }

    sendJson(res, 404, { error: 'Not found' });
  } catch (err) {
    handleRouteError(res, 'reports', err);
  }
}
