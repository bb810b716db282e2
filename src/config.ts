/**
 * Application configuration.
 * Read once at startup from the environment and passed explicitly into the
 * container. Nothing below the container reads process.env.
 */

import { z } from 'zod';

export type CompletionProviderName = 'openai' | 'bedrock';

export const DEFAULT_MODEL_IDS: Record<CompletionProviderName, string> = {
  openai: 'gpt-4o-mini',
  bedrock: 'anthropic.claude-3-haiku-20240307-v1:0',
};

export interface AppConfig {
  completionProvider: CompletionProviderName;
  modelId: string;
  /** Region of the hosted model / clustering services. */
  region: string;
  openaiApiKey?: string;
  /** Deadline shared by every external call of one request. */
  requestTimeoutMs: number;
  /** Sub-deadline for the translation call; always below requestTimeoutMs. */
  translationTimeoutMs: number;
  maxTextLength: number;
  maxTokens: number;
  /** Deny-list JSON file; the bundled list is used when unset. */
  denyListPath?: string;
  /** Multiplier applied to confidence when the language could not be handled. */
  lowConfidenceFactor: number;
  /** Fill missing sentiment_score / confidence with 0.0 and flag the result. */
  allowDegradedScores: boolean;
  /** Substring identifying the clustering endpoint. */
  segmentEndpointKeyword: string;
  axiom?: { apiToken: string; dataset: string };
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  COMPLETION_PROVIDER: z.enum(['openai', 'bedrock']).default('openai'),
  MODEL_ID: z.string().min(1).optional(),
  MODEL_REGION: z.string().min(1).default('us-east-1'),
  OPENAI_API_KEY: z.string().min(1).optional(),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(25_000),
  TRANSLATION_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  MAX_TEXT_LENGTH: z.coerce.number().int().positive().default(5_000),
  MAX_TOKENS: z.coerce.number().int().positive().default(1_000),
  DENY_LIST_PATH: z.string().min(1).optional(),
  LOW_CONFIDENCE_FACTOR: z.coerce.number().min(0).max(1).default(0.5),
  ALLOW_DEGRADED_SCORES: booleanFlag.default('false'),
  SEGMENT_ENDPOINT_KEYWORD: z.string().min(1).default('kmeans'),
  AXIOM_API_KEY: z.string().min(1).optional(),
  AXIOM_DATASET: z.string().min(1).optional(),
});

/**
 * Build an AppConfig from environment variables.
 * Empty strings count as unset. Throws listing every invalid variable.
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const parsed = envSchema.safeParse(present);

  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const e = parsed.data;

  if (e.COMPLETION_PROVIDER === 'openai' && !e.OPENAI_API_KEY) {
    throw new Error('Invalid configuration: OPENAI_API_KEY is required when COMPLETION_PROVIDER=openai');
  }

  const translationTimeoutMs =
    e.TRANSLATION_TIMEOUT_MS ?? Math.max(1, Math.floor(e.REQUEST_TIMEOUT_MS / 3));
  if (translationTimeoutMs >= e.REQUEST_TIMEOUT_MS) {
    throw new Error('Invalid configuration: TRANSLATION_TIMEOUT_MS must be lower than REQUEST_TIMEOUT_MS');
  }

  return {
    completionProvider: e.COMPLETION_PROVIDER,
    modelId: e.MODEL_ID ?? DEFAULT_MODEL_IDS[e.COMPLETION_PROVIDER],
    region: e.MODEL_REGION,
    openaiApiKey: e.OPENAI_API_KEY,
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    translationTimeoutMs,
    maxTextLength: e.MAX_TEXT_LENGTH,
    maxTokens: e.MAX_TOKENS,
    denyListPath: e.DENY_LIST_PATH,
    lowConfidenceFactor: e.LOW_CONFIDENCE_FACTOR,
    allowDegradedScores: e.ALLOW_DEGRADED_SCORES,
    segmentEndpointKeyword: e.SEGMENT_ENDPOINT_KEYWORD,
    ...(e.AXIOM_API_KEY && e.AXIOM_DATASET
      ? { axiom: { apiToken: e.AXIOM_API_KEY, dataset: e.AXIOM_DATASET } }
      : {}),
  };
}
