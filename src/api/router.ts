/**
 * API router.
 * Maps HTTP method + path pattern to handlers.
 * Framework-agnostic; works with any Request/Response based runtime.
 */

import type { Container } from '../container.js';
import { pipeline, type Handler, type HandlerContext } from '../middleware/pipeline.js';
import type { ApiErrorResponse } from '../types/api.js';
import { createInsightHandlers } from './insights.js';
import { createSegmentHandlers } from './segments.js';

interface Route {
  method: string;
  pattern: RegExp;
  handler: Handler;
}

export function createRouter(container: Container) {
  const insights = createInsightHandlers(container);
  const segments = createSegmentHandlers(container);

  const routes: Route[] = [
    { method: 'POST', pattern: /^\/insights\/?$/, handler: insights.analyze },
    { method: 'POST', pattern: /^\/segments\/?$/, handler: segments.predict },
  ];

  const dispatch: Handler = async (req: Request, ctx: HandlerContext) => {
    const url = new URL(req.url);
    const method = req.method;

    // CORS preflight
    if (method === 'OPTIONS') {
      return new Response(null, {
        status: 204,
        headers: corsHeaders(),
      });
    }

    for (const route of routes) {
      if (route.method === method && route.pattern.test(url.pathname)) {
        const response = await route.handler(req, ctx);
        return addCorsHeaders(response);
      }
    }

    // Check if path matches but method doesn't
    const allowed = routes.filter((r) => r.pattern.test(url.pathname)).map((r) => r.method);
    if (allowed.length > 0) {
      return errorResponse(405, 'METHOD_NOT_ALLOWED', `Method ${method} not allowed`, {
        Allow: allowed.join(', '),
      });
    }

    return errorResponse(404, 'NOT_FOUND', `No route matches ${method} ${url.pathname}`);
  };

  const handle = pipeline(container.logging)(dispatch);

  return { handle };
}

function errorResponse(
  status: number,
  code: ApiErrorResponse['code'],
  message: string,
  extraHeaders: Record<string, string> = {}
): Response {
  const body: ApiErrorResponse = { status: 'error', code, error: message };
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...extraHeaders, ...corsHeaders() },
  });
}

export function corsHeaders(): Record<string, string> {
  return {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'POST, OPTIONS',
    'Access-Control-Allow-Headers': 'Content-Type, Authorization',
    'Access-Control-Max-Age': '86400',
  };
}

function addCorsHeaders(response: Response): Response {
  const headers = new Headers(response.headers);
  for (const [key, value] of Object.entries(corsHeaders())) {
    headers.set(key, value);
  }
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}
