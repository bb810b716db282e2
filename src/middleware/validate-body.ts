/**
 * Body validation middleware.
 * Parses the JSON body, enforces a size limit and checks field types against
 * a schema. Failures throw ValidationError (400 via the error handler),
 * carrying the route's sample payload.
 */

import { ValidationError } from '../errors.js';
import type { BodySchema, FieldSchema, JsonObject } from '../types/common.js';
import type { Handler, Middleware } from './pipeline.js';

export const DEFAULT_MAX_BODY_BYTES = 64 * 1024;

export interface ValidateBodyOptions {
  /** Sample valid payload included in 400 responses. */
  example?: unknown;
  maxBytes?: number;
}

export function validateBody(schema: BodySchema, options: ValidateBodyOptions = {}): Middleware {
  const maxBytes = options.maxBytes ?? DEFAULT_MAX_BODY_BYTES;
  const fail = (message: string) => new ValidationError(message, options.example);

  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const declared = Number(req.headers.get('Content-Length') ?? '0');
      if (declared > maxBytes) {
        throw fail(`Request body must be ${maxBytes} bytes or less`);
      }

      const raw = await req.text();
      if (Buffer.byteLength(raw, 'utf8') > maxBytes) {
        throw fail(`Request body must be ${maxBytes} bytes or less`);
      }

      let body: unknown;
      try {
        body = JSON.parse(raw);
      } catch {
        throw fail('Request body must be valid JSON');
      }

      if (!isJsonObject(body)) {
        throw fail('Request body must be a JSON object');
      }

      const errors = validateFields(body, schema);
      if (errors.length > 0) {
        throw fail(errors.join('; '));
      }

      // Re-create request with the consumed body so the handler can read it again
      const newReq = new Request(req.url, {
        method: req.method,
        headers: req.headers,
        body: raw,
        signal: req.signal,
      });

      return next(newReq, ctx);
    };
  };
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateFields(body: JsonObject, schema: BodySchema): string[] {
  const errors: string[] = [];

  for (const [field, fieldSchema] of Object.entries(schema)) {
    const value = body[field];

    if (fieldSchema.required && (value === undefined || value === null)) {
      errors.push(`${field} is required`);
      continue;
    }

    if (value === undefined || value === null) {
      continue;
    }

    const typeError = checkType(field, value, fieldSchema);
    if (typeError) {
      errors.push(typeError);
      continue;
    }

    errors.push(...checkConstraints(field, value, fieldSchema));
  }

  return errors;
}

function checkType(field: string, value: unknown, schema: FieldSchema): string | null {
  switch (schema.type) {
    case 'string':
      if (typeof value !== 'string') return `${field} must be a string`;
      break;
    case 'number':
      if (typeof value !== 'number') return `${field} must be a number`;
      break;
    case 'boolean':
      if (typeof value !== 'boolean') return `${field} must be a boolean`;
      break;
    case 'array':
      if (!Array.isArray(value)) return `${field} must be an array`;
      break;
    case 'object':
      if (!isJsonObject(value)) return `${field} must be an object`;
      break;
  }
  return null;
}

function checkConstraints(field: string, value: unknown, schema: FieldSchema): string[] {
  const errors: string[] = [];

  if (schema.type === 'string' && typeof value === 'string') {
    if (schema.maxLength !== undefined && value.length > schema.maxLength) {
      errors.push(`${field} must be ${schema.maxLength} characters or less`);
    }
    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${field} must be one of: ${schema.enum.join(', ')}`);
    }
  }

  if (schema.type === 'number' && typeof value === 'number') {
    if (schema.min !== undefined && value < schema.min) {
      errors.push(`${field} must be at least ${schema.min}`);
    }
    if (schema.max !== undefined && value > schema.max) {
      errors.push(`${field} must be at most ${schema.max}`);
    }
  }

  return errors;
}
