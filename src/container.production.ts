/**
 * Production container: configuration from the environment, real providers.
 * Built once per cold start and reused by warm invocations.
 */

import { loadConfig, type AppConfig } from './config.js';
import { createContainer, type Container } from './container.js';
import {
  AxiomLogProvider,
  BedrockCompletionProvider,
  ConsoleLogProvider,
  OpenAICompletionProvider,
  SageMakerClusteringProvider,
  type ICompletionProvider,
  type ILogProvider,
} from './providers/index.js';

let cached: Container | null = null;

export function getProductionContainer(
  env: Record<string, string | undefined> = process.env
): Container {
  if (cached) return cached;

  const config = loadConfig(env);

  cached = createContainer(config, {
    completionProvider: completionProviderFor(config),
    clusteringProvider: new SageMakerClusteringProvider({ region: config.region }),
    logProvider: logProviderFor(config),
  });

  return cached;
}

function completionProviderFor(config: AppConfig): ICompletionProvider {
  if (config.completionProvider === 'bedrock') {
    return new BedrockCompletionProvider({ region: config.region });
  }
  if (!config.openaiApiKey) {
    throw new Error('OPENAI_API_KEY is required when COMPLETION_PROVIDER=openai');
  }
  return new OpenAICompletionProvider({ apiKey: config.openaiApiKey });
}

// Axiom logging when configured, console (the platform's log drain) otherwise.
// The container outlives a request, so stdout logging keeps no events in memory.
function logProviderFor(config: AppConfig): ILogProvider {
  return config.axiom
    ? new AxiomLogProvider({ apiToken: config.axiom.apiToken, dataset: config.axiom.dataset })
    : new ConsoleLogProvider({ outputToConsole: true, minLevel: 'info', maxEvents: 0 });
}
