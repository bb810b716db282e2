/**
 * Error handler middleware.
 * Catches errors thrown by handlers and maps them to structured JSON responses.
 * AppError subclasses get their status code (and a sample payload on 400);
 * unknown errors become a generic 500 without internals. Content-policy labels
 * are logged, never returned.
 */

import { AppError, ContentPolicyError, describeError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ApiErrorResponse } from '../types/api.js';
import { jsonResponse, type Handler, type Middleware } from './pipeline.js';

export function createErrorHandler(logProvider: ILogProvider): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      try {
        return await next(req, ctx);
      } catch (err) {
        if (err instanceof AppError) {
          if (err.statusCode >= 500) {
            logProvider.error(err.message, { code: err.code, detail: describeError(err) });
          } else if (err instanceof ContentPolicyError) {
            logProvider.warn('Feedback rejected by content policy', {
              code: err.code,
              labels: err.labels,
              ...(ctx.requestId ? { requestId: ctx.requestId } : {}),
            });
          }

          const body: ApiErrorResponse = {
            status: 'error',
            code: err.code,
            error: err.message,
            ...(err.example !== undefined && { example: err.example }),
          };
          return jsonResponse(body, err.statusCode);
        }

        logProvider.error('Unhandled error', {
          error: describeError(err),
          ...(err instanceof Error && err.stack ? { stack: err.stack } : {}),
        });

        const body: ApiErrorResponse = {
          status: 'error',
          code: 'INTERNAL_ERROR',
          error: 'An unexpected error occurred',
        };
        return jsonResponse(body, 500);
      }
    };
  };
}
