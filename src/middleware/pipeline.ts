/**
 * Handler and middleware types for the detector's HTTP surface.
 *
 * A request context travels through every layer. Authentication fills in
 * the caller; detection handlers note what they produced so the request
 * log can report it once the response is known.
 */

import type { ApiClient, DetectionSummary } from '../types/models.js';

export interface HandlerContext {
  client: ApiClient | null;
  /** Outcome noted by a detection handler; absent on other routes. */
  detection?: DetectionSummary;
}

export type Handler = (req: Request, ctx: HandlerContext) => Promise<Response>;
export type Middleware = (next: Handler) => Handler;

/** Fresh context for one incoming request. */
export function requestContext(): HandlerContext {
  return { client: null };
}

/**
 * Wrap a handler in middleware, first argument outermost:
 *   pipeline(logging('detect'), errorHandler, authenticate, validateBody(schema))(handler)
 * The request log sits outside the error handler so it sees the mapped status.
 */
export function pipeline(...middlewares: Middleware[]) {
  return (handler: Handler): Handler =>
    middlewares.reduceRight<Handler>((next, wrap) => wrap(next), handler);
}
