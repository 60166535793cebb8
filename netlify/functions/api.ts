/**
 * Netlify Function entry point.
 * Single function handles every route via the router.
 * The container is created on first request and shared across warm invocations.
 */

import type { Context } from '@netlify/functions';
import { createRouter } from '../../src/api/router.js';
import { getProductionContainer } from '../../src/container.production.js';
import { AppError, InternalError } from '../../src/errors.js';
import { errorResponse } from '../../src/middleware/error-handler.js';
import { requestContext } from '../../src/middleware/pipeline.js';

let router: ReturnType<typeof createRouter> | null = null;

export default async (req: Request, _context: Context) => {
  if (!router) {
    try {
      router = createRouter(getProductionContainer());
    } catch (err) {
      // Configuration errors (INIT_ERROR) are reported on every request until fixed.
      console.error('[ERROR] Container initialisation failed', err);
      return errorResponse(err instanceof AppError ? err : new InternalError());
    }
  }
  return router.handle(req, requestContext());
};

export const config = {
  path: ['/api/v1/*', '/health', '/metrics'],
};
