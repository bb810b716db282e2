/**
 * Input validation for feedback submissions.
 *
 * Extracts text/source/category from the raw payload, enforces the length
 * bounds and checks the text against the content deny-list (spam, profanity,
 * prompt-injection phrases). Runs before any external call is made, and
 * masks contact details so they never reach the model or the logs.
 */

import { ContentPolicyError, ValidationError } from '../errors.js';
import type { DenyList } from '../data/load.js';
import type { FeedbackRequest } from '../types/models.js';

export const EXAMPLE_FEEDBACK = {
  text: 'The blender works great but the lid leaks when it is full.',
  source: 'customer_review',
  category: 'product',
} as const;

const DEFAULT_SOURCE = 'unknown';
const DEFAULT_CATEGORY = 'general';
const MAX_LABEL_LENGTH = 100;

const PII_PATTERNS: Array<[RegExp, string]> = [
  [/\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g, '[EMAIL]'],
  [/\b\d{3}-\d{2}-\d{4}\b/g, '[SSN]'],
  [/\b\d{3}[-.]?\d{3}[-.]?\d{4}\b/g, '[PHONE]'],
];

interface DenyRule {
  pattern: RegExp;
  label: string;
}

export class InputValidator {
  private readonly rules: DenyRule[];

  constructor(
    denyList: DenyList,
    private readonly maxTextLength: number
  ) {
    this.rules = denyList.entries.map(({ pattern, label }) => {
      try {
        return { pattern: new RegExp(pattern, 'iu'), label };
      } catch (err) {
        throw new Error(
          `Invalid deny-list pattern for "${label}": ${err instanceof Error ? err.message : String(err)}`
        );
      }
    });
  }

  validate(payload: unknown): FeedbackRequest {
    if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
      throw new ValidationError('Request body must be a JSON object', EXAMPLE_FEEDBACK);
    }

    const body: Record<string, unknown> = { ...payload };
    const text = body.text;

    if (text === undefined || text === null) {
      throw new ValidationError('text is required', EXAMPLE_FEEDBACK);
    }
    if (typeof text !== 'string') {
      throw new ValidationError('text must be a string', EXAMPLE_FEEDBACK);
    }

    const trimmed = text.trim();
    if (trimmed.length === 0) {
      throw new ValidationError('text must not be empty', EXAMPLE_FEEDBACK);
    }
    if (trimmed.length > this.maxTextLength) {
      throw new ValidationError(
        `text must be ${this.maxTextLength} characters or less`,
        EXAMPLE_FEEDBACK
      );
    }

    const labels = this.policyViolations(trimmed);
    if (labels.length > 0) {
      throw new ContentPolicyError(
        'text was rejected by the content policy',
        labels,
        EXAMPLE_FEEDBACK
      );
    }

    return Object.freeze({
      text: redactPii(trimmed),
      source: this.label(body, 'source', DEFAULT_SOURCE),
      category: this.label(body, 'category', DEFAULT_CATEGORY),
    });
  }

  /** Labels of every deny-list rule the text matches, in list order, deduplicated. */
  policyViolations(text: string): string[] {
    const labels: string[] = [];
    for (const { pattern, label } of this.rules) {
      if (pattern.test(text) && !labels.includes(label)) {
        labels.push(label);
      }
    }
    return labels;
  }

  private label(body: Record<string, unknown>, field: 'source' | 'category', fallback: string): string {
    const value = body[field];
    if (value === undefined || value === null) return fallback;
    if (typeof value !== 'string') {
      throw new ValidationError(`${field} must be a string`, EXAMPLE_FEEDBACK);
    }
    const trimmed = value.trim();
    if (trimmed.length > MAX_LABEL_LENGTH) {
      throw new ValidationError(
        `${field} must be ${MAX_LABEL_LENGTH} characters or less`,
        EXAMPLE_FEEDBACK
      );
    }
    return trimmed.length > 0 ? trimmed : fallback;
  }
}

/** Replace e-mail addresses, SSN-shaped and phone-shaped numbers with placeholders. */
export function redactPii(text: string): string {
  return PII_PATTERNS.reduce((acc, [pattern, placeholder]) => acc.replace(pattern, placeholder), text);
}
