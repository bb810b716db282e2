export { pipeline, jsonResponse, JSON_HEADERS } from './pipeline.js';
export type { Handler, HandlerContext, Middleware } from './pipeline.js';
export { createErrorHandler } from './error-handler.js';
export { validateBody, isJsonObject } from './validate-body.js';
export { createLoggingMiddleware } from './logging.js';
