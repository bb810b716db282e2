import { describe, it, expect, beforeEach } from 'vitest';
import { createErrorHandler } from '../../src/middleware/error-handler.js';
import {
  ContentPolicyError,
  ExtractionError,
  InvalidInputError,
  NotFoundError,
  UpstreamError,
  ValidationError,
} from '../../src/errors.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import type { Handler, HandlerContext, Middleware } from '../../src/middleware/pipeline.js';

describe('errorHandler', () => {
  const ctx: HandlerContext = { requestId: null };
  const req = new Request('http://test');
  let logProvider: ConsoleLogProvider;
  let errorHandler: Middleware;

  beforeEach(() => {
    logProvider = new ConsoleLogProvider();
    errorHandler = createErrorHandler(logProvider);
  });

  it('should pass through successful responses', async () => {
    const handler: Handler = async () =>
      new Response(JSON.stringify({ ok: true }), { status: 200 });

    const res = await errorHandler(handler)(req, ctx);

    expect(res.status).toBe(200);
  });

  it('should map ValidationError to 400 with the example payload', async () => {
    const handler: Handler = async () => {
      throw new ValidationError('text is required', { text: 'sample' });
    };

    const res = await errorHandler(handler)(req, ctx);
    const body = await res.json();

    expect(res.status).toBe(400);
    expect(body).toEqual({
      status: 'error',
      code: 'INVALID_REQUEST',
      error: 'text is required',
      example: { text: 'sample' },
    });
  });

  it('should map ContentPolicyError to 400 without exposing labels', async () => {
    const handler: Handler = async () => {
      throw new ContentPolicyError('text was rejected by the content policy', ['profanity']);
    };

    const res = await errorHandler(handler)(req, ctx);
    const body = await res.json();

    expect(res.status).toBe(400);
    expect(body).toEqual({
      status: 'error',
      code: 'CONTENT_POLICY',
      error: 'text was rejected by the content policy',
    });
  });

  it('should log the matched content-policy labels as a warning', async () => {
    const handler: Handler = async () => {
      throw new ContentPolicyError('text was rejected by the content policy', [
        'instruction override',
        'secret extraction attempt',
      ]);
    };

    await errorHandler(handler)(req, { requestId: 'req-7' });

    const warnings = logProvider.eventsAt('warn');
    expect(warnings).toHaveLength(1);
    expect(warnings[0].message).toBe('Feedback rejected by content policy');
    expect(warnings[0].fields).toEqual({
      code: 'CONTENT_POLICY',
      labels: ['instruction override', 'secret extraction attempt'],
      requestId: 'req-7',
    });
    expect(logProvider.eventsAt('error')).toHaveLength(0);
  });

  it('should map InvalidInputError to 400', async () => {
    const handler: Handler = async () => {
      throw new InvalidInputError('Missing features array', { features: [[1]] });
    };

    const res = await errorHandler(handler)(req, ctx);
    const body = await res.json();

    expect(res.status).toBe(400);
    expect(body.code).toBe('INVALID_INPUT');
    expect(body.example).toEqual({ features: [[1]] });
  });

  it('should map NotFoundError to 404', async () => {
    const handler: Handler = async () => {
      throw new NotFoundError('No kmeans endpoint found');
    };

    const res = await errorHandler(handler)(req, ctx);
    const body = await res.json();

    expect(res.status).toBe(404);
    expect(body).toEqual({ status: 'error', code: 'NOT_FOUND', error: 'No kmeans endpoint found' });
    expect(logProvider.events).toHaveLength(0);
  });

  it('should map upstream failures to 500 and log the cause', async () => {
    const handler: Handler = async () => {
      throw new UpstreamError('Clustering endpoint invocation failed', {
        cause: new Error('ModelError: bad CSV'),
      });
    };

    const res = await errorHandler(handler)(req, ctx);
    const body = await res.json();

    expect(res.status).toBe(500);
    expect(body.error).toBe('Clustering endpoint invocation failed');
    expect(JSON.stringify(body)).not.toContain('bad CSV');
    expect(logProvider.eventsAt('error')[0].fields).toEqual({
      code: 'UPSTREAM_ERROR',
      detail: 'Clustering endpoint invocation failed (ModelError: bad CSV)',
    });
  });

  it('should keep the extraction message caller-safe', async () => {
    const handler: Handler = async () => {
      throw new ExtractionError('UpstreamUnavailable', { cause: new Error('api key rejected') });
    };

    const res = await errorHandler(handler)(req, ctx);
    const body = await res.json();

    expect(body.code).toBe('UPSTREAM_UNAVAILABLE');
    expect(body.error).toBe('Insight extraction failed: the language model service is unavailable');
  });

  it('should map unknown errors to 500 without exposing internals', async () => {
    const handler: Handler = async () => {
      throw new Error('secret connection string with credentials');
    };

    const res = await errorHandler(handler)(req, ctx);
    const body = await res.json();

    expect(res.status).toBe(500);
    expect(body).toEqual({
      status: 'error',
      code: 'INTERNAL_ERROR',
      error: 'An unexpected error occurred',
    });
    expect(logProvider.eventsAt('error')[0].message).toBe('Unhandled error');
  });

  it('should set Content-Type to application/json', async () => {
    const handler: Handler = async () => {
      throw new NotFoundError('gone');
    };

    const res = await errorHandler(handler)(req, ctx);

    expect(res.headers.get('Content-Type')).toBe('application/json');
  });
});
