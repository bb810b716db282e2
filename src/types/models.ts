/**
 * Domain models: entities as the pipeline understands them.
 * Decoupled from the snake_case wire shapes in api.ts.
 */

// ── Feedback ──

export type Language = 'english' | 'spanish' | 'french' | 'other';

export type SentimentLabel = 'positive' | 'negative' | 'neutral' | 'mixed';

export type Severity = 'mild' | 'moderate' | 'severe';

export interface FeedbackRequest {
  readonly text: string;
  readonly source: string;
  readonly category: string;
}

export interface SafetyFinding {
  /** Canonical event name, e.g. "burn". */
  readonly event: string;
  readonly severity: Severity;
  /** 0.0 – 1.0 */
  readonly confidence: number;
  readonly safetyCategory: string;
  /** Excerpt around the matched trigger, not the full text. */
  readonly detectedPhrase: string;
}

export interface InsightResult {
  /** -1.0 (most negative) – 1.0 (most positive) */
  sentimentScore: number;
  sentimentLabel: SentimentLabel;
  languageDetected: Language;
  unmetNeeds: string[];
  painPoints: string[];
  positiveAspects: string[];
  recommendations: string[];
  /** 0.0 – 1.0 */
  confidence: number;
  /** Set when a missing score was filled with its neutral value. */
  degraded: boolean;
}

/** How the language stage prepared the text for extraction. */
export type TranslationStatus = 'not_needed' | 'translated' | 'failed' | 'skipped';

export interface ResolvedLanguage {
  language: Language;
  /** English text handed to the extractor (the original when untranslated). */
  text: string;
  translation: TranslationStatus;
  /** True when downstream confidence should be lowered. */
  lowConfidence: boolean;
}

// ── Segmentation ──

export interface ClusterPrediction {
  closestCluster: number;
  distanceToCluster: number;
}

export interface SegmentationResult {
  predictions: ClusterPrediction[];
  endpoint: string;
  featuresProcessed: number;
}
