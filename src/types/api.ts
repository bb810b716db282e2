/**
 * API types: shapes for request/response payloads.
 * Wire fields are snake_case; the Response Assembler maps domain models onto them.
 */

import type { Language, SentimentLabel, Severity, TranslationStatus } from './models.js';

// ── Requests ──

export interface InsightRequestBody {
  text: string;
  source?: string;
  category?: string;
}

export interface SegmentRequestBody {
  features: number[][];
}

// ── Responses ──

export interface SafetyConcernBody {
  event: string;
  severity: Severity;
  confidence: number;
  safety_category: string;
  detected_phrase: string;
}

export interface InsightSuccessBody {
  status: 'success';
  sentiment_score: number;
  sentiment_label: SentimentLabel;
  language_detected: Language;
  unmet_needs: string[];
  pain_points: string[];
  positive_aspects: string[];
  recommendations: string[];
  confidence: number;
  adverse_events: string[];
  safety_concerns: SafetyConcernBody[];
  processing_time_ms: number;
  model: string;
  translation: TranslationStatus;
  degraded?: true;
}

export interface InsightErrorBody {
  status: 'error';
  code: ErrorCode;
  error: string;
  processing_time_ms: number;
}

export type InsightResponseBody = InsightSuccessBody | InsightErrorBody;

export interface ClusterPredictionBody {
  closest_cluster: number;
  distance_to_cluster: number;
}

export interface SegmentResponseBody {
  predictions: ClusterPredictionBody[];
  endpoint: string;
  model: string;
  features_processed: number;
}

// ── Errors ──

export type ErrorCode =
  | 'INVALID_REQUEST'
  | 'CONTENT_POLICY'
  | 'INVALID_INPUT'
  | 'NOT_FOUND'
  | 'METHOD_NOT_ALLOWED'
  | 'UPSTREAM_UNAVAILABLE'
  | 'MALFORMED_OUTPUT'
  | 'UPSTREAM_ERROR'
  | 'INTERNAL_ERROR';

export interface ApiErrorResponse {
  status: 'error';
  code: ErrorCode;
  error: string;
  example?: unknown;
}
