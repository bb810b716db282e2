/**
 * OpenAI completion provider.
 * Wraps the chat completions API with a single user message.
 */

import OpenAI from 'openai';
import type { CompletionRequest, ICompletionProvider } from './ICompletionProvider.js';

export class OpenAICompletionProvider implements ICompletionProvider {
  private client: OpenAI;

  constructor(opts: { apiKey: string; baseURL?: string }) {
    this.client = new OpenAI({
      apiKey: opts.apiKey,
      baseURL: opts.baseURL,
      // One attempt per request; the pipeline owns the deadline.
      maxRetries: 0,
    });
  }

  async complete(request: CompletionRequest): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: request.modelId,
        max_tokens: request.maxTokens,
        temperature: 0,
        messages: [{ role: 'user', content: request.prompt }],
      },
      { signal: request.signal }
    );

    return response.choices[0]?.message?.content ?? '';
  }
}
