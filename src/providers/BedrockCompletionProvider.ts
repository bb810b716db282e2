/**
 * AWS Bedrock completion provider.
 * Invokes an Anthropic model through bedrock-runtime using the messages body format.
 */

import { BedrockRuntimeClient, InvokeModelCommand } from '@aws-sdk/client-bedrock-runtime';
import { z } from 'zod';
import type { CompletionRequest, ICompletionProvider } from './ICompletionProvider.js';

const ANTHROPIC_VERSION = 'bedrock-2023-05-31';

const messagesResponseSchema = z.object({
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    })
  ),
});

export class BedrockCompletionProvider implements ICompletionProvider {
  readonly client: BedrockRuntimeClient;

  constructor(opts: { region: string; client?: BedrockRuntimeClient }) {
    this.client = opts.client ?? new BedrockRuntimeClient({ region: opts.region, maxAttempts: 1 });
  }

  async complete(request: CompletionRequest): Promise<string> {
    const command = new InvokeModelCommand({
      modelId: request.modelId,
      contentType: 'application/json',
      accept: 'application/json',
      body: JSON.stringify({
        anthropic_version: ANTHROPIC_VERSION,
        max_tokens: request.maxTokens,
        temperature: 0,
        messages: [{ role: 'user', content: request.prompt }],
      }),
    });

    const response = await this.client.send(command, { abortSignal: request.signal });

    if (!response.body) {
      throw new Error('Bedrock returned an empty body');
    }

    const parsed = messagesResponseSchema.safeParse(
      JSON.parse(new TextDecoder().decode(response.body))
    );
    if (!parsed.success) {
      throw new Error(`Unexpected Bedrock response shape: ${parsed.error.message}`);
    }

    return parsed.data.content
      .filter((part) => part.type === 'text')
      .map((part) => part.text ?? '')
      .join('');
  }
}
