/**
 * Application errors.
 * Services throw these; the error-handler middleware maps them to the
 * `{ result: "Failed", errors: [...] }` envelope with the matching status.
 */

import type { ErrorCode, ErrorEnvelope } from './types/api.js';

export class AppError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly statusCode: number,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }

  toEnvelope(): ErrorEnvelope {
    return {
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

/** Malformed or incomplete request. Never retried by the service. */
export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION_ERROR', message, 400, details);
  }
}

/** Missing or unknown service API key. */
export class UnauthorizedError extends AppError {
  constructor(message = 'Missing or invalid X-API-Key header') {
    super('UNAUTHORIZED', message, 401);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message, 404);
  }
}

export class MethodNotAllowedError extends AppError {
  constructor(method: string, readonly allowed: string[]) {
    super('METHOD_NOT_ALLOWED', `Method ${method} not allowed`, 405, { allowed });
  }
}

/** The model provider rejected the credential. */
export class ModelAuthError extends AppError {
  constructor(message = 'Invalid model API key. Please check your credentials.') {
    super('AUTH_ERROR', message, 401);
  }
}

/** Rate limit or quota exhausted at the model provider. */
export class QuotaError extends AppError {
  constructor(
    message = 'Model quota or rate limit exceeded. Please try again later.',
    retryAfter = 60
  ) {
    super('QUOTA_ERROR', message, 429, { retryAfter });
  }
}

export class ModelNotFoundError extends AppError {
  constructor(model: string) {
    super('MODEL_NOT_FOUND', `Model '${model}' not found or not accessible.`, 404, { model });
  }
}

/** Required process-wide configuration is missing or invalid. */
export class InitError extends AppError {
  constructor(message: string) {
    super('INIT_ERROR', message, 500);
  }
}

/** Anything unexpected. The message never carries internals. */
export class InternalError extends AppError {
  constructor(message = 'Internal server error') {
    super('INTERNAL_ERROR', message, 500);
  }
}
