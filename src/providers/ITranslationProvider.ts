import type { Language } from '../types/models.js';

/** Translates supported non-English feedback into English. Throws on failure. */
export interface ITranslationProvider {
  translate(text: string, from: Exclude<Language, 'english' | 'other'>, signal?: AbortSignal): Promise<string>;
}
