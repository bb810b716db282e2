/**
 * Language detection and translation to English.
 *
 * Detection is local and deterministic: indicator-word hits per language plus
 * language-specific characters. Spanish and French are translated before
 * extraction; anything else passes through untranslated. Translation failure
 * never fails the request: the call runs under its own sub-deadline, so a
 * hanging translator leaves the rest of the request budget to extraction.
 */

import type { LanguageIndicators } from '../data/load.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ITranslationProvider } from '../providers/ITranslationProvider.js';
import type { Language, ResolvedLanguage } from '../types/models.js';
import { describeError } from '../errors.js';
import { createDeadline, raceAbort } from './deadline.js';

type Scored = Exclude<Language, 'other'>;

/** Tie-break order. */
const SCORED_LANGUAGES: Scored[] = ['english', 'spanish', 'french'];

/** Share of plain a-z letters above which indicator-free text counts as English. */
const ASCII_LETTER_SHARE = 0.8;

export interface LanguageHandlerOptions {
  /** Budget for one translation call, carved out of the request deadline. */
  translationTimeoutMs: number;
}

export class LanguageHandler {
  private readonly words: Record<Scored, Set<string>>;
  private readonly markers: Record<'spanish' | 'french', string[]>;

  constructor(
    indicators: LanguageIndicators,
    private readonly translator: ITranslationProvider,
    private readonly logProvider: ILogProvider,
    private readonly opts: LanguageHandlerOptions
  ) {
    this.words = {
      english: new Set(indicators.english.map((w) => w.toLowerCase())),
      spanish: new Set(indicators.spanish.map((w) => w.toLowerCase())),
      french: new Set(indicators.french.map((w) => w.toLowerCase())),
    };
    this.markers = indicators.markers;
  }

  detect(text: string): Language {
    const lower = text.toLowerCase();
    const tokens = lower.match(/\p{L}+/gu) ?? [];

    const scores: Record<Scored, number> = { english: 0, spanish: 0, french: 0 };
    for (const token of tokens) {
      for (const language of SCORED_LANGUAGES) {
        if (this.words[language].has(token)) scores[language]++;
      }
    }
    for (const language of ['spanish', 'french'] as const) {
      for (const marker of this.markers[language]) {
        scores[language] += countOccurrences(lower, marker);
      }
    }

    let best: Scored = 'english';
    for (const language of SCORED_LANGUAGES) {
      if (scores[language] > scores[best]) best = language;
    }

    if (scores[best] > 0) return best;
    return mostlyAscii(tokens) ? 'english' : 'other';
  }

  /**
   * Detect the language and produce the English text to analyse.
   * Only the translation call can suspend. It is abandoned when the request
   * signal aborts or its own sub-deadline elapses, whichever comes first.
   */
  async resolve(text: string, signal: AbortSignal): Promise<ResolvedLanguage> {
    const language = this.detect(text);

    if (language === 'english') {
      return { language, text, translation: 'not_needed', lowConfidence: false };
    }

    if (language === 'other') {
      return { language, text, translation: 'skipped', lowConfidence: true };
    }

    const deadline = createDeadline(this.opts.translationTimeoutMs, signal);
    try {
      const translated = await raceAbort(
        this.translator.translate(text, language, deadline.signal),
        deadline.signal
      );
      return { language, text: translated, translation: 'translated', lowConfidence: false };
    } catch (err) {
      this.logProvider.warn('Translation failed; analysing original text', {
        language,
        error: describeError(err),
      });
      return { language, text, translation: 'failed', lowConfidence: true };
    } finally {
      deadline.dispose();
    }
  }
}

function mostlyAscii(tokens: string[]): boolean {
  const letters = tokens.join('');
  if (letters.length === 0) return false;
  const ascii = letters.match(/[a-z]/g)?.length ?? 0;
  return ascii / letters.length >= ASCII_LETTER_SHARE;
}

function countOccurrences(haystack: string, needle: string): number {
  let count = 0;
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    count++;
    index = haystack.indexOf(needle, index + needle.length);
  }
  return count;
}
