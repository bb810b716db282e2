/**
 * LLM-backed insight extraction.
 *
 * Renders the insight prompt, makes exactly one completion call and validates
 * the reply against a strict schema. Never throws: the outcome is a typed
 * result the pipeline must branch on.
 */

import { z } from 'zod';
import { ExtractionError } from '../errors.js';
import { INSIGHT_PROMPT, render } from '../prompts/templates.js';
import type { ICompletionProvider } from '../providers/ICompletionProvider.js';
import type { InsightResult, Language } from '../types/models.js';
import { abortReason, raceAbort } from './deadline.js';
import { extractJsonObject } from './json.js';

export type ExtractionResult =
  | { ok: true; value: InsightResult }
  | { ok: false; error: ExtractionError };

export interface ExtractionInput {
  /** English text to analyse. */
  text: string;
  source: string;
  category: string;
  language: Language;
}

export interface InsightExtractorOptions {
  modelId: string;
  maxTokens: number;
  /** Fill a missing sentiment_score / confidence with 0.0 instead of failing. */
  allowDegradedScores: boolean;
}

const stringList = z.array(z.string().trim()).transform((items) => items.filter((s) => s.length > 0));

const completionSchema = z.object({
  sentiment_score: z.number().optional(),
  sentiment_label: z
    .string()
    .transform((s) => s.trim().toLowerCase())
    .pipe(z.enum(['positive', 'negative', 'neutral', 'mixed'])),
  unmet_needs: stringList,
  pain_points: stringList,
  positive_aspects: stringList,
  recommendations: stringList,
  confidence: z.number().optional(),
});

export class InsightExtractor {
  constructor(
    private readonly completion: ICompletionProvider,
    private readonly opts: InsightExtractorOptions
  ) {}

  buildPrompt(input: ExtractionInput): string {
    return render(INSIGHT_PROMPT, {
      text: input.text,
      source: input.source,
      category: input.category,
    });
  }

  async extract(input: ExtractionInput, signal: AbortSignal): Promise<ExtractionResult> {
    // The budget is already spent; the model is never called.
    if (signal.aborted) {
      return {
        ok: false,
        error: new ExtractionError('UpstreamUnavailable', { cause: abortReason(signal) }),
      };
    }

    let completion: string;
    try {
      completion = await raceAbort(
        this.completion.complete({
          prompt: this.buildPrompt(input),
          modelId: this.opts.modelId,
          maxTokens: this.opts.maxTokens,
          signal,
        }),
        signal
      );
    } catch (err) {
      return { ok: false, error: new ExtractionError('UpstreamUnavailable', { cause: err }) };
    }

    return this.parse(completion, input.language);
  }

  parse(completion: string, language: Language): ExtractionResult {
    let raw: unknown;
    try {
      raw = extractJsonObject(completion);
    } catch (err) {
      return { ok: false, error: new ExtractionError('MalformedOutput', { cause: err }) };
    }

    const parsed = completionSchema.safeParse(raw);
    if (!parsed.success) {
      return {
        ok: false,
        error: new ExtractionError('MalformedOutput', { cause: parsed.error }),
      };
    }

    const data = parsed.data;
    const missingScores = data.sentiment_score === undefined || data.confidence === undefined;

    if (missingScores && !this.opts.allowDegradedScores) {
      return {
        ok: false,
        error: new ExtractionError('MalformedOutput', {
          cause: new Error('Completion is missing sentiment_score or confidence'),
        }),
      };
    }

    return {
      ok: true,
      value: {
        sentimentScore: clamp(data.sentiment_score ?? 0, -1, 1),
        sentimentLabel: data.sentiment_label,
        languageDetected: language,
        unmetNeeds: data.unmet_needs,
        painPoints: data.pain_points,
        positiveAspects: data.positive_aspects,
        recommendations: data.recommendations,
        confidence: clamp(data.confidence ?? 0, 0, 1),
        degraded: missingScores,
      },
    };
  }
}

function clamp(n: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, n));
}
