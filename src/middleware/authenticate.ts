/**
 * Authentication middleware.
 * Checks the X-API-Key header against the configured service keys and
 * attaches the caller to context. With no keys configured every request passes.
 */

import { createHash, timingSafeEqual } from 'node:crypto';
import { UnauthorizedError } from '../errors.js';
import { errorResponse } from './error-handler.js';
import type { Handler, Middleware } from './pipeline.js';

const CLIENT_ID_LENGTH = 12;

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

/** Short fingerprint of a key, safe to log. */
export function clientIdFor(apiKey: string): string {
  return digest(apiKey).toString('hex').slice(0, CLIENT_ID_LENGTH);
}

export function createAuthMiddleware(serviceApiKeys: readonly string[]): Middleware {
  // Comparing fixed-length digests keeps timingSafeEqual from leaking key length.
  const allowed = serviceApiKeys.map(digest);

  return (next: Handler): Handler => {
    return async (req, ctx) => {
      if (allowed.length === 0) return next(req, ctx);

      const apiKey = req.headers.get('X-API-Key')?.trim();
      if (!apiKey) {
        return errorResponse(new UnauthorizedError());
      }

      const presented = digest(apiKey);
      let matched = false;
      for (const candidate of allowed) {
        if (timingSafeEqual(presented, candidate)) matched = true;
      }
      if (!matched) {
        return errorResponse(new UnauthorizedError('Invalid API key'));
      }

      ctx.client = { id: clientIdFor(apiKey) };
      return next(req, ctx);
    };
  };
}
