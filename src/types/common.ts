/**
 * Shared schema types for request body validation.
 */

export type FieldType = 'string' | 'number' | 'boolean' | 'array' | 'object';

export interface FieldSchema {
  type: FieldType;
  required?: boolean;
  maxLength?: number;
  min?: number;
  max?: number;
  enum?: string[];
}

export type BodySchema = Record<string, FieldSchema>;

export type JsonObject = Record<string, unknown>;
