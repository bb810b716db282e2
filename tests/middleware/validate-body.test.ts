import { describe, it, expect } from 'vitest';
import { isJsonObject, validateBody } from '../../src/middleware/validate-body.js';
import { ValidationError } from '../../src/errors.js';
import type { Handler, HandlerContext } from '../../src/middleware/pipeline.js';
import type { BodySchema } from '../../src/types/common.js';

describe('validateBody', () => {
  const ctx: HandlerContext = { requestId: null };

  const echoHandler: Handler = async (req) => {
    const body: unknown = await req.json();
    return new Response(JSON.stringify(body), { status: 200 });
  };

  function makeReq(body: string): Request {
    return new Request('http://test', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
    });
  }

  const schema: BodySchema = {
    text: { type: 'string', required: true, maxLength: 50 },
    rating: { type: 'number', required: false, min: 1, max: 5 },
    features: { type: 'array', required: false },
  };

  it('should pass a valid body through to the handler', async () => {
    const wrapped = validateBody(schema)(echoHandler);
    const res = await wrapped(makeReq(JSON.stringify({ text: 'ok', rating: 4 })), ctx);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ text: 'ok', rating: 4 });
  });

  it('should reject a missing required field with the example payload', async () => {
    const wrapped = validateBody(schema, { example: { text: 'sample' } })(echoHandler);

    const err = await wrapped(makeReq(JSON.stringify({ rating: 3 })), ctx).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ValidationError);
    if (err instanceof ValidationError) {
      expect(err.message).toBe('text is required');
      expect(err.example).toEqual({ text: 'sample' });
    }
  });

  it('should join every field error', async () => {
    const wrapped = validateBody(schema)(echoHandler);

    await expect(
      wrapped(makeReq(JSON.stringify({ text: 7, rating: 9, features: 'x' })), ctx)
    ).rejects.toThrow('text must be a string; rating must be at most 5; features must be an array');
  });

  it('should reject a string over maxLength', async () => {
    const wrapped = validateBody(schema)(echoHandler);

    await expect(wrapped(makeReq(JSON.stringify({ text: 'a'.repeat(51) })), ctx)).rejects.toThrow(
      'text must be 50 characters or less'
    );
  });

  it('should reject a body that is not JSON', async () => {
    const wrapped = validateBody(schema)(echoHandler);

    await expect(wrapped(makeReq('not json'), ctx)).rejects.toThrow(
      'Request body must be valid JSON'
    );
  });

  it('should reject JSON that is not an object', async () => {
    const wrapped = validateBody(schema)(echoHandler);

    await expect(wrapped(makeReq('["text"]'), ctx)).rejects.toThrow(
      'Request body must be a JSON object'
    );
  });

  it('should reject a body over the size limit', async () => {
    const wrapped = validateBody(schema, { maxBytes: 32 })(echoHandler);

    await expect(
      wrapped(makeReq(JSON.stringify({ text: 'x'.repeat(40) })), ctx)
    ).rejects.toThrow('Request body must be 32 bytes or less');
  });

  it('should validate enum values', async () => {
    const enumSchema: BodySchema = {
      source: { type: 'string', required: true, enum: ['web', 'app_store'] },
    };
    const wrapped = validateBody(enumSchema)(echoHandler);

    const good = await wrapped(makeReq(JSON.stringify({ source: 'web' })), ctx);
    expect(good.status).toBe(200);

    await expect(wrapped(makeReq(JSON.stringify({ source: 'fax' })), ctx)).rejects.toThrow(
      'source must be one of: web, app_store'
    );
  });
});

describe('isJsonObject', () => {
  it('should accept plain objects only', () => {
    expect(isJsonObject({})).toBe(true);
    expect(isJsonObject([])).toBe(false);
    expect(isJsonObject(null)).toBe(false);
    expect(isJsonObject('x')).toBe(false);
  });
});
