/**
 * Dependency wiring.
 * Constructs all services from the configuration and the external providers.
 * Production passes real OpenAI/Bedrock/SageMaker providers; tests pass doubles.
 */

import type { AppConfig } from './config.js';
import {
  loadDenyList,
  loadLanguageIndicators,
  loadSafetyTable,
  type DenyList,
  type LanguageIndicators,
  type SafetyTable,
} from './data/load.js';
import type { Middleware } from './middleware/pipeline.js';
import { createErrorHandler } from './middleware/error-handler.js';
import { createLoggingMiddleware } from './middleware/logging.js';
import type { IClusteringProvider } from './providers/IClusteringProvider.js';
import type { ICompletionProvider } from './providers/ICompletionProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { ITranslationProvider } from './providers/ITranslationProvider.js';
import { CompletionTranslationProvider } from './providers/CompletionTranslationProvider.js';
import { InputValidator } from './services/InputValidator.js';
import { InsightExtractor } from './services/InsightExtractor.js';
import { InsightPipeline } from './services/InsightPipeline.js';
import { LanguageHandler } from './services/LanguageHandler.js';
import { ResponseAssembler } from './services/ResponseAssembler.js';
import { SafetyScanner } from './services/SafetyScanner.js';
import { SegmentationService } from './services/SegmentationService.js';

export interface Container {
  insightPipeline: InsightPipeline;
  segmentationService: SegmentationService;
  logProvider: ILogProvider;
  errorHandler: Middleware;
  logging: Middleware;
}

export interface ContainerDeps {
  completionProvider: ICompletionProvider;
  clusteringProvider: IClusteringProvider;
  logProvider: ILogProvider;
  /** Defaults to translating through the completion provider. */
  translationProvider?: ITranslationProvider;
  /** Data tables; the bundled JSON files are used when omitted. */
  safetyTable?: SafetyTable;
  denyList?: DenyList;
  languageIndicators?: LanguageIndicators;
  /** Monotonic clock for processing_time_ms. */
  now?: () => number;
}

export function createContainer(config: AppConfig, deps: ContainerDeps): Container {
  const translationProvider =
    deps.translationProvider ??
    new CompletionTranslationProvider(deps.completionProvider, {
      modelId: config.modelId,
      maxTokens: config.maxTokens,
    });

  const insightPipeline = new InsightPipeline({
    validator: new InputValidator(
      deps.denyList ?? loadDenyList(config.denyListPath),
      config.maxTextLength
    ),
    languageHandler: new LanguageHandler(
      deps.languageIndicators ?? loadLanguageIndicators(),
      translationProvider,
      deps.logProvider,
      { translationTimeoutMs: config.translationTimeoutMs }
    ),
    safetyScanner: new SafetyScanner(deps.safetyTable ?? loadSafetyTable()),
    extractor: new InsightExtractor(deps.completionProvider, {
      modelId: config.modelId,
      maxTokens: config.maxTokens,
      allowDegradedScores: config.allowDegradedScores,
    }),
    assembler: new ResponseAssembler(config.lowConfidenceFactor),
    logProvider: deps.logProvider,
    modelId: config.modelId,
    requestTimeoutMs: config.requestTimeoutMs,
    now: deps.now,
  });

  const segmentationService = new SegmentationService(deps.clusteringProvider, {
    endpointKeyword: config.segmentEndpointKeyword,
    requestTimeoutMs: config.requestTimeoutMs,
  });

  return {
    insightPipeline,
    segmentationService,
    logProvider: deps.logProvider,
    errorHandler: createErrorHandler(deps.logProvider),
    logging: createLoggingMiddleware(deps.logProvider),
  };
}
