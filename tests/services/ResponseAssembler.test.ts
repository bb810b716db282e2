import { describe, it, expect } from 'vitest';
import { ResponseAssembler, adverseEvents } from '../../src/services/ResponseAssembler.js';
import { ExtractionError } from '../../src/errors.js';
import type { InsightResult, ResolvedLanguage, SafetyFinding } from '../../src/types/models.js';

const insight: InsightResult = {
  sentimentScore: -0.5,
  sentimentLabel: 'negative',
  languageDetected: 'english',
  unmetNeeds: ['Better insulation'],
  painPoints: ['Handle gets hot'],
  positiveAspects: ['Boils quickly'],
  recommendations: ['Redesign the handle'],
  confidence: 0.8,
  degraded: false,
};

const english: ResolvedLanguage = {
  language: 'english',
  text: 'The handle got hot and burned me',
  translation: 'not_needed',
  lowConfidence: false,
};

const burn: SafetyFinding = {
  event: 'burn',
  severity: 'mild',
  confidence: 0.85,
  safetyCategory: 'Thermal Injury',
  detectedPhrase: 'The handle got hot and burned me',
};

describe('ResponseAssembler', () => {
  const assembler = new ResponseAssembler(0.5);

  describe('success', () => {
    it('should build the wire response', () => {
      const body = assembler.success({
        insight,
        findings: [burn],
        language: english,
        elapsedMs: 41.6,
        model: 'test-model',
      });

      expect(body).toEqual({
        status: 'success',
        sentiment_score: -0.5,
        sentiment_label: 'negative',
        language_detected: 'english',
        unmet_needs: ['Better insulation'],
        pain_points: ['Handle gets hot'],
        positive_aspects: ['Boils quickly'],
        recommendations: ['Redesign the handle'],
        confidence: 0.8,
        adverse_events: ['burn'],
        safety_concerns: [
          {
            event: 'burn',
            severity: 'mild',
            confidence: 0.85,
            safety_category: 'Thermal Injury',
            detected_phrase: 'The handle got hot and burned me',
          },
        ],
        processing_time_ms: 42,
        model: 'test-model',
        translation: 'not_needed',
      });
    });

    it('should report empty safety lists when nothing was found', () => {
      const body = assembler.success({
        insight,
        findings: [],
        language: english,
        elapsedMs: 5,
        model: 'test-model',
      });

      expect(body.adverse_events).toEqual([]);
      expect(body.safety_concerns).toEqual([]);
    });

    it('should scale confidence down for low-confidence language handling', () => {
      const body = assembler.success({
        insight,
        findings: [],
        language: { ...english, language: 'french', translation: 'failed', lowConfidence: true },
        elapsedMs: 5,
        model: 'test-model',
      });

      expect(body.confidence).toBe(0.4);
      expect(body.language_detected).toBe('french');
      expect(body.translation).toBe('failed');
    });

    it('should flag degraded results', () => {
      const body = assembler.success({
        insight: { ...insight, confidence: 0, degraded: true },
        findings: [],
        language: english,
        elapsedMs: 5,
        model: 'test-model',
      });

      expect(body.degraded).toBe(true);
    });

    it('should never report a negative processing time', () => {
      const body = assembler.success({
        insight,
        findings: [],
        language: english,
        elapsedMs: -3,
        model: 'test-model',
      });

      expect(body.processing_time_ms).toBe(0);
    });
  });

  describe('failure', () => {
    it('should carry only the error fields', () => {
      const body = assembler.failure(new ExtractionError('MalformedOutput'), 12.2);

      expect(body).toEqual({
        status: 'error',
        code: 'MALFORMED_OUTPUT',
        error: 'Insight extraction failed: the language model returned an unusable result',
        processing_time_ms: 12,
      });
    });
  });

  describe('adverseEvents', () => {
    it('should list distinct events in first-seen order', () => {
      const shock: SafetyFinding = { ...burn, event: 'electrical_hazard' };

      expect(adverseEvents([shock, burn, shock])).toEqual(['electrical_hazard', 'burn']);
    });
  });
});
