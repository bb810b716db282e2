/**
 * Hosted language-model interface.
 * Implementations send one prompt and return the raw text completion.
 * They throw on transport or service errors; interpreting the text is the caller's job.
 */

export interface CompletionRequest {
  prompt: string;
  modelId: string;
  maxTokens: number;
  /** Aborts the in-flight call (deadline or client disconnect). */
  signal?: AbortSignal;
}

export interface ICompletionProvider {
  complete(request: CompletionRequest): Promise<string>;
}
