/**
 * Request logging middleware.
 *
 * One event per request. Besides method, path, status and duration it reads
 * the outcome back from the JSON body the route produced: the error `code`
 * of a failed request and the insight pipeline's `processing_time_ms`, so a
 * single log line tells which stage failed and how long the model took
 * compared with the whole request.
 *
 *   2xx → info, 4xx → warn, 5xx or a thrown error → error (re-thrown)
 */

import { z } from 'zod';
import type { ILogProvider, LogLevel, RequestLogEvent } from '../providers/ILogProvider.js';
import type { Handler, HandlerContext, Middleware } from './pipeline.js';

const outcomeSchema = z.object({
  code: z.string().optional(),
  processing_time_ms: z.number().optional(),
});

type Outcome = Pick<RequestLogEvent, 'code' | 'processingTimeMs'>;

export function createLoggingMiddleware(logProvider: ILogProvider): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const { pathname } = new URL(req.url);
      const start = performance.now();
      const elapsed = () => Math.round(performance.now() - start);

      let response: Response;
      try {
        response = await next(req, ctx);
      } catch (err) {
        logProvider.log(
          requestEvent(req.method, pathname, 500, elapsed(), ctx, {}, {
            error: err instanceof Error ? err.message : String(err),
          })
        );
        throw err;
      }

      const durationMs = elapsed();
      const outcome = await readOutcome(response);
      logProvider.log(requestEvent(req.method, pathname, response.status, durationMs, ctx, outcome));
      return response;
    };
  };
}

function requestEvent(
  method: string,
  path: string,
  status: number,
  durationMs: number,
  ctx: HandlerContext,
  outcome: Outcome,
  fields?: Record<string, unknown>
): RequestLogEvent {
  const code = outcome.code ? ` ${outcome.code}` : '';
  return {
    level: levelFor(status),
    message: `${method} ${path} ${status}${code} (${durationMs}ms)`,
    method,
    path,
    status,
    durationMs,
    ...outcome,
    ...(ctx.requestId ? { requestId: ctx.requestId } : {}),
    ...(fields ? { fields } : {}),
  };
}

function levelFor(status: number): LogLevel {
  if (status >= 500) return 'error';
  if (status >= 400) return 'warn';
  return 'info';
}

/** Error code and pipeline time from a JSON body; the caller still gets the untouched original. */
async function readOutcome(response: Response): Promise<Outcome> {
  if (!response.headers.get('Content-Type')?.includes('application/json')) return {};

  const text = await response.clone().text();
  const parsed = outcomeSchema.safeParse(parseJson(text));
  if (!parsed.success) return {};

  const { code, processing_time_ms } = parsed.data;
  return {
    ...(code !== undefined ? { code } : {}),
    ...(processing_time_ms !== undefined ? { processingTimeMs: processing_time_ms } : {}),
  };
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    // A non-JSON body under a JSON content type carries no outcome.
    return undefined;
  }
}
