/**
 * Feedback insight pipeline.
 *
 *   Received → Validated → LanguageResolved → SafetyScanned → Extracted → Assembled
 *
 * Validation failures throw (the caller answers 400) before any external call.
 * After validation every outcome is an InsightResponseBody; extraction failures
 * become status "error" with the upstream detail kept in the logs only.
 */

import { describeError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { InsightResponseBody } from '../types/api.js';
import { createDeadline } from './deadline.js';
import type { InputValidator } from './InputValidator.js';
import type { InsightExtractor } from './InsightExtractor.js';
import type { LanguageHandler } from './LanguageHandler.js';
import type { ResponseAssembler } from './ResponseAssembler.js';
import type { SafetyScanner } from './SafetyScanner.js';

export type PipelineStage =
  | 'Validated'
  | 'LanguageResolved'
  | 'SafetyScanned'
  | 'Extracted'
  | 'Assembled'
  | 'Failed';

export interface InsightPipelineDeps {
  validator: InputValidator;
  languageHandler: LanguageHandler;
  safetyScanner: SafetyScanner;
  extractor: InsightExtractor;
  assembler: ResponseAssembler;
  logProvider: ILogProvider;
  modelId: string;
  requestTimeoutMs: number;
  /** Monotonic clock in ms. */
  now?: () => number;
}

export class InsightPipeline {
  private readonly now: () => number;

  constructor(private readonly deps: InsightPipelineDeps) {
    this.now = deps.now ?? (() => performance.now());
  }

  /**
   * Run one request through every stage.
   * @param signal the caller's signal; aborting it abandons in-flight external calls
   */
  async run(payload: unknown, signal?: AbortSignal): Promise<InsightResponseBody> {
    const { validator, languageHandler, safetyScanner, extractor, assembler, logProvider } = this.deps;

    const request = validator.validate(payload);
    this.transition('Validated', { source: request.source, category: request.category });

    const start = this.now();
    const deadline = createDeadline(this.deps.requestTimeoutMs, signal);

    try {
      const language = await languageHandler.resolve(request.text, deadline.signal);
      this.transition('LanguageResolved', {
        language: language.language,
        translation: language.translation,
      });

      // Trigger phrases are English, so scan the English-equivalent text.
      const findings = safetyScanner.scan(language.text);
      this.transition('SafetyScanned', { findings: findings.length });

      const extraction = await extractor.extract(
        {
          text: language.text,
          source: request.source,
          category: request.category,
          language: language.language,
        },
        deadline.signal
      );

      if (!extraction.ok) {
        this.transition('Failed', { kind: extraction.error.kind });
        logProvider.error('Insight extraction failed', {
          kind: extraction.error.kind,
          detail: describeError(extraction.error),
        });
        return assembler.failure(extraction.error, this.now() - start);
      }

      this.transition('Extracted', { degraded: extraction.value.degraded });

      const response = assembler.success({
        insight: extraction.value,
        findings,
        language,
        elapsedMs: this.now() - start,
        model: this.deps.modelId,
      });
      this.transition('Assembled', { adverseEvents: response.adverse_events.length });
      return response;
    } finally {
      deadline.dispose();
    }
  }

  private transition(stage: PipelineStage, fields: Record<string, unknown>): void {
    this.deps.logProvider.debug(`insight pipeline: ${stage}`, { stage, ...fields });
  }
}
