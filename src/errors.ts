/**
 * Application error hierarchy.
 * Every error the API reports on purpose extends AppError; the error handler
 * middleware maps them to status codes. Anything else becomes a generic 500.
 */

import type { ErrorCode } from './types/api.js';

export class AppError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly statusCode: number,
    /** Sample valid payload returned alongside 400 responses. */
    readonly example?: unknown,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, example?: unknown, code: ErrorCode = 'INVALID_REQUEST') {
    super(code, message, 400, example);
  }
}

/** Text matched the content deny-list. */
export class ContentPolicyError extends ValidationError {
  constructor(
    message: string,
    readonly labels: string[],
    example?: unknown
  ) {
    super(message, example, 'CONTENT_POLICY');
  }
}

/** Segmentation proxy: features missing, empty or non-numeric. */
export class InvalidInputError extends AppError {
  constructor(message: string, example?: unknown) {
    super('INVALID_INPUT', message, 400, example);
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Not found') {
    super('NOT_FOUND', message, 404);
  }
}

export type ExtractionErrorKind = 'UpstreamUnavailable' | 'MalformedOutput';

const EXTRACTION_MESSAGES: Record<ExtractionErrorKind, string> = {
  UpstreamUnavailable: 'Insight extraction failed: the language model service is unavailable',
  MalformedOutput: 'Insight extraction failed: the language model returned an unusable result',
};

/**
 * Insight extraction failure. The message is safe to show callers;
 * the upstream detail stays on `cause` and is only logged.
 */
export class ExtractionError extends AppError {
  constructor(
    readonly kind: ExtractionErrorKind,
    options?: { cause?: unknown }
  ) {
    super(
      kind === 'UpstreamUnavailable' ? 'UPSTREAM_UNAVAILABLE' : 'MALFORMED_OUTPUT',
      EXTRACTION_MESSAGES[kind],
      500,
      undefined,
      options
    );
  }
}

/** Segmentation proxy: the clustering endpoint failed or answered nonsense. */
export class UpstreamError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('UPSTREAM_ERROR', message, 500, undefined, options);
  }
}

/** Best-effort description of a thrown value, for logs only. */
export function describeError(err: unknown): string {
  if (err instanceof AppError && err.cause !== undefined) {
    return `${err.message} (${describeError(err.cause)})`;
  }
  if (err instanceof Error) return err.message;
  return String(err);
}
