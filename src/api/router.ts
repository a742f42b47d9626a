/**
 * API router.
 * Maps HTTP method + path pattern to handlers.
 * Framework-agnostic — works with any Request/Response based runtime.
 */

import type { Container } from '../container.js';
import type { Handler, HandlerContext } from '../middleware/pipeline.js';
import { createEvaluationHandlers } from './evaluations.js';
import { createStatsHandlers } from './stats.js';
import { createSystemHandlers } from './system.js';
import { errorResponse } from '../responses.js';

interface Route {
  method: string;
  pattern: RegExp;
  handler: Handler;
}

export function createRouter(container: Container) {
  const evaluations = createEvaluationHandlers(container);
  const stats = createStatsHandlers(container);
  const system = createSystemHandlers(container);

  const routes: Route[] = [
    // Service
    { method: 'GET', pattern: /^\/?$/, handler: system.root },
    { method: 'GET', pattern: /^\/health\/?$/, handler: system.health },

    // Evaluations
    { method: 'POST', pattern: /^\/api\/v1\/evaluation\/?$/, handler: evaluations.submit },

    // Stats
    { method: 'GET', pattern: /^\/api\/v1\/stats\/?$/, handler: stats.getStats },
  ];

  const handle: Handler = async (req: Request, ctx: HandlerContext) => {
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
    const allowed = routes
      .filter((r) => r.pattern.test(url.pathname))
      .map((r) => r.method);

    if (allowed.length > 0) {
      return errorResponse(
        405,
        { code: 'INVALID_REQUEST', message: `Method ${method} not allowed` },
        { Allow: allowed.join(', '), ...corsHeaders() }
      );
    }

    return errorResponse(
      404,
      { code: 'NOT_FOUND', message: `No route matches ${method} ${url.pathname}` },
      corsHeaders()
    );
  };

  return { handle };
}

function corsHeaders(): Record<string, string> {
  return {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
    'Access-Control-Allow-Headers': 'Content-Type',
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
