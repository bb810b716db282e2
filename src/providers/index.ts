export type { ILogProvider, LogEvent, LogLevel, RequestLogEvent } from './ILogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';
export { AxiomLogProvider } from './AxiomLogProvider.js';
export type { ICompletionProvider, CompletionRequest } from './ICompletionProvider.js';
export { OpenAICompletionProvider } from './OpenAICompletionProvider.js';
export { BedrockCompletionProvider } from './BedrockCompletionProvider.js';
export type { ITranslationProvider } from './ITranslationProvider.js';
export { CompletionTranslationProvider } from './CompletionTranslationProvider.js';
export type { IClusteringProvider } from './IClusteringProvider.js';
export { SageMakerClusteringProvider } from './SageMakerClusteringProvider.js';
