/**
 * Error handler middleware.
 * Catches errors thrown by handlers and maps them to the failure envelope.
 * AppError subclasses get their status code and details; unknown errors become 500.
 */

import { AppError, InternalError, QuotaError } from '../errors.js';
import type { Handler } from './pipeline.js';
import type { ApiErrorResponse } from '../types/api.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

/** Render an AppError as `{ result: "Failed", errors: [...] }`. */
export function errorResponse(err: AppError, extraHeaders?: Record<string, string>): Response {
  const body: ApiErrorResponse = {
    result: 'Failed',
    errors: [err.toEnvelope()],
  };

  const headers: Record<string, string> = { ...JSON_HEADERS, ...extraHeaders };

  if (err instanceof QuotaError && err.details?.retryAfter) {
    headers['Retry-After'] = String(err.details.retryAfter);
  }

  return new Response(JSON.stringify(body), {
    status: err.statusCode,
    headers,
  });
}

export function errorHandler(next: Handler): Handler {
  return async (req, ctx) => {
    try {
      return await next(req, ctx);
    } catch (err) {
      if (err instanceof AppError) {
        return errorResponse(err);
      }
      // Unknown error: don't leak internals
      return errorResponse(new InternalError('An unexpected error occurred'));
    }
  };
}
