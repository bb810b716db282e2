/**
 * Composable middleware pipeline for serverless function handlers.
 * Middleware wraps handlers in order (left to right), forming an onion model.
 */

export interface HandlerContext {
  /** Platform request id, used to correlate log lines. */
  requestId: string | null;
}

export type Handler = (req: Request, ctx: HandlerContext) => Promise<Response>;
export type Middleware = (next: Handler) => Handler;

/**
 * Compose middleware into a function that wraps a handler.
 * Middleware is applied left-to-right:
 *   pipeline(errorHandler, validateBody(schema))(handler)
 *   → errorHandler wraps (validateBody wraps handler)
 */
export function pipeline(...middlewares: Middleware[]) {
  return (handler: Handler): Handler => {
    return middlewares.reduceRight<Handler>((next, mw) => mw(next), handler);
  };
}

export const JSON_HEADERS = { 'Content-Type': 'application/json' };

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: JSON_HEADERS });
}
