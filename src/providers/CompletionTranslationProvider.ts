/**
 * Translation through the hosted completion model.
 * Sends the translation prompt and reads `english_translation` from the JSON reply.
 */

import { z } from 'zod';
import { render, TRANSLATION_PROMPT } from '../prompts/templates.js';
import { extractJsonObject } from '../services/json.js';
import type { ICompletionProvider } from './ICompletionProvider.js';
import type { ITranslationProvider } from './ITranslationProvider.js';

const translationSchema = z.object({
  english_translation: z.string().trim().min(1),
});

export class CompletionTranslationProvider implements ITranslationProvider {
  constructor(
    private readonly completion: ICompletionProvider,
    private readonly opts: { modelId: string; maxTokens: number }
  ) {}

  async translate(text: string, from: 'spanish' | 'french', signal?: AbortSignal): Promise<string> {
    const completion = await this.completion.complete({
      prompt: render(TRANSLATION_PROMPT, { language: from, text }),
      modelId: this.opts.modelId,
      maxTokens: this.opts.maxTokens,
      signal,
    });

    const parsed = translationSchema.safeParse(extractJsonObject(completion));
    if (!parsed.success) {
      throw new Error(`Translation reply was not usable: ${parsed.error.message}`);
    }
    return parsed.data.english_translation;
  }
}
