/**
 * HTTP routes for the fulfillment backend, written against the web
 * Request/Response types so they run under any adapter (node:http, tests).
 *
 *   POST   /fulfill                 submit a snapshot, start a cycle
 *   GET    /session/{id}/cached     accumulated cards for the current cycle
 *   DELETE /session/{id}            forget the session (204, idempotent)
 *   GET    /health                  fulfiller availability
 */

import { BACKEND_ROUTES } from '@shared/constants';
import { FulfillRequestSchema, SessionIdSchema, formatIssues } from '@shared/schemas';
import type { FulfillmentOrchestrator } from '../services/fulfillment/FulfillmentOrchestrator';

export type RequestHandler = (request: Request) => Promise<Response>;

const CACHED_PATH = /^\/session\/([^/]+)\/cached\/?$/;
const SESSION_PATH = /^\/session\/([^/]+)\/?$/;

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function errorResponse(error: string, status: number): Response {
  return json({ error }, status);
}

/** Decoded, validated session id, or a 400 response. */
function sessionIdFrom(raw: string): string | Response {
  let decoded: string;
  try {
    decoded = decodeURIComponent(raw);
  } catch {
    return errorResponse('Invalid input: sessionId: malformed percent-encoding', 400);
  }
  const result = SessionIdSchema.safeParse(decoded);
  if (!result.success) {
    return errorResponse(`Invalid input: ${formatIssues(result.error)}`, 400);
  }
  return result.data;
}

export function createRequestHandler(orchestrator: FulfillmentOrchestrator): RequestHandler {
  async function route(request: Request): Promise<Response> {
    const { pathname } = new URL(request.url);

    if (request.method === 'POST' && pathname === BACKEND_ROUTES.FULFILL) {
      let body: unknown;
      try {
        body = await request.json();
      } catch {
        return errorResponse('Invalid input: body is not valid JSON', 400);
      }
      const parsed = FulfillRequestSchema.safeParse(body);
      if (!parsed.success) {
        return errorResponse(`Invalid input: ${formatIssues(parsed.error)}`, 400);
      }
      return json(await orchestrator.submit(parsed.data));
    }

    if (request.method === 'GET' && pathname === BACKEND_ROUTES.HEALTH) {
      return json(orchestrator.health());
    }

    const cached = request.method === 'GET' ? CACHED_PATH.exec(pathname) : null;
    if (cached) {
      const sessionId = sessionIdFrom(cached[1]);
      if (sessionId instanceof Response) return sessionId;
      return json(orchestrator.snapshot(sessionId));
    }

    const session = request.method === 'DELETE' ? SESSION_PATH.exec(pathname) : null;
    if (session) {
      const sessionId = sessionIdFrom(session[1]);
      if (sessionId instanceof Response) return sessionId;
      orchestrator.clear(sessionId);
      return new Response(null, { status: 204 });
    }

    return errorResponse(`Not found: ${request.method} ${pathname}`, 404);
  }

  return async (request) => {
    try {
      return await route(request);
    } catch (error) {
      console.error(`[Routes] ${request.method} ${request.url} failed:`, error);
      return errorResponse('Internal server error', 500);
    }
  };
}
