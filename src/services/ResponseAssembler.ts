/**
 * Response assembly.
 * Merges scanner findings and the extraction result into the wire response.
 */

import type { AppError } from '../errors.js';
import type {
  InsightErrorBody,
  InsightSuccessBody,
  SafetyConcernBody,
} from '../types/api.js';
import type { InsightResult, ResolvedLanguage, SafetyFinding } from '../types/models.js';

export interface AssembleSuccessInput {
  insight: InsightResult;
  findings: SafetyFinding[];
  language: ResolvedLanguage;
  elapsedMs: number;
  model: string;
}

export class ResponseAssembler {
  constructor(private readonly lowConfidenceFactor: number) {}

  success(input: AssembleSuccessInput): InsightSuccessBody {
    const { insight, findings, language } = input;
    const confidence = language.lowConfidence
      ? insight.confidence * this.lowConfidenceFactor
      : insight.confidence;

    return {
      status: 'success',
      sentiment_score: insight.sentimentScore,
      sentiment_label: insight.sentimentLabel,
      language_detected: language.language,
      unmet_needs: [...insight.unmetNeeds],
      pain_points: [...insight.painPoints],
      positive_aspects: [...insight.positiveAspects],
      recommendations: [...insight.recommendations],
      confidence: Math.round(confidence * 1000) / 1000,
      adverse_events: adverseEvents(findings),
      safety_concerns: findings.map(toSafetyConcernBody),
      processing_time_ms: elapsedToMs(input.elapsedMs),
      model: input.model,
      translation: language.translation,
      ...(insight.degraded && { degraded: true as const }),
    };
  }

  failure(error: AppError, elapsedMs: number): InsightErrorBody {
    return {
      status: 'error',
      code: error.code,
      error: error.message,
      processing_time_ms: elapsedToMs(elapsedMs),
    };
  }
}

/** Distinct event names in first-occurrence order. */
export function adverseEvents(findings: SafetyFinding[]): string[] {
  return [...new Set(findings.map((f) => f.event))];
}

function toSafetyConcernBody(finding: SafetyFinding): SafetyConcernBody {
  return {
    event: finding.event,
    severity: finding.severity,
    confidence: finding.confidence,
    safety_category: finding.safetyCategory,
    detected_phrase: finding.detectedPhrase,
  };
}

function elapsedToMs(elapsedMs: number): number {
  return Number.isFinite(elapsedMs) ? Math.max(0, Math.round(elapsedMs)) : 0;
}
