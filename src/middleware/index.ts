export { pipeline, requestContext } from './pipeline.js';
export type { Handler, HandlerContext, Middleware } from './pipeline.js';
export { errorHandler, errorResponse } from './error-handler.js';
export { createAuthMiddleware, clientIdFor } from './authenticate.js';
export { validateBody } from './validate-body.js';
export { createRequestLogging } from './logging.js';
