/**
 * API router.
 * Maps HTTP method + path pattern to handlers.
 * Framework-agnostic: works with any Request/Response based runtime.
 */

import type { Container } from '../container.js';
import { MethodNotAllowedError, NotFoundError } from '../errors.js';
import { errorResponse } from '../middleware/error-handler.js';
import type { Handler, HandlerContext } from '../middleware/pipeline.js';
import { createDetectHandlers } from './detect.js';
import { createHealthHandlers } from './health.js';
import { createHsCodeHandlers } from './hscodes.js';
import { createStatsHandlers } from './stats.js';

interface Route {
  method: string;
  pattern: RegExp;
  handler: Handler;
}

export function createRouter(container: Container) {
  const health = createHealthHandlers(container);
  const detect = createDetectHandlers(container);
  const stats = createStatsHandlers(container);
  const hscodes = createHsCodeHandlers(container);

  const routes: Route[] = [
    // Operations
    { method: 'GET', pattern: /^\/health\/?$/, handler: health.health },
    { method: 'GET', pattern: /^\/metrics\/?$/, handler: health.metrics },

    // Detection
    { method: 'POST', pattern: /^\/api\/v1\/detect\/?$/, handler: detect.detect },
    { method: 'POST', pattern: /^\/api\/v1\/detect\/batch\/?$/, handler: detect.batch },

    // Administration
    { method: 'GET', pattern: /^\/api\/v1\/stats\/?$/, handler: stats.getStats },
    { method: 'DELETE', pattern: /^\/api\/v1\/cache\/?$/, handler: stats.clearCache },

    // HS codes
    { method: 'GET', pattern: /^\/api\/v1\/hscodes\/?$/, handler: hscodes.search },
    { method: 'GET', pattern: /^\/api\/v1\/hscodes\/[^/]+\/?$/, handler: hscodes.validate },
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
      return errorResponse(new MethodNotAllowedError(method, allowed), {
        Allow: allowed.join(', '),
        ...corsHeaders(),
      });
    }

    return errorResponse(new NotFoundError(`No route matches ${method} ${url.pathname}`), corsHeaders());
  };

  return { handle, routes };
}

function corsHeaders(): Record<string, string> {
  return {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, POST, DELETE, OPTIONS',
    'Access-Control-Allow-Headers': 'X-API-Key, Content-Type',
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
