/**
 * Adverse-event scanner for customer feedback.
 *
 * Table-driven keyword matching: each canonical event owns a set of trigger
 * phrases with a static confidence, plus modifiers that escalate severity.
 * Pure and synchronous; identical text always yields the identical list,
 * ordered by where each event is first mentioned.
 */

import type { SafetyEventEntry, SafetyTable } from '../data/load.js';
import type { SafetyFinding, Severity } from '../types/models.js';

interface CompiledTrigger {
  phrase: string;
  confidence: number;
  pattern: RegExp;
}

interface CompiledEvent {
  event: string;
  safetyCategory: string;
  triggers: CompiledTrigger[];
  moderate: RegExp[];
  severe: RegExp[];
}

interface TriggerMatch {
  trigger: CompiledTrigger;
  index: number;
  length: number;
}

const CONFIDENCE_FLOOR = 0.1;

export class SafetyScanner {
  private readonly events: CompiledEvent[];
  private readonly globalModerate: RegExp[];
  private readonly globalSevere: RegExp[];
  private readonly negations: Set<string>;

  constructor(private readonly table: SafetyTable) {
    this.events = table.events.map(compileEvent);
    this.globalModerate = table.intensityModifiers.moderate.map(phrasePattern);
    this.globalSevere = table.intensityModifiers.severe.map(phrasePattern);
    this.negations = new Set(table.negations.map((n) => n.toLowerCase()));
  }

  scan(text: string): SafetyFinding[] {
    const located: Array<{ finding: SafetyFinding; index: number; order: number }> = [];

    this.events.forEach((event, order) => {
      const match = earliestMatch(event.triggers, text);
      if (!match) return;

      const confidence = this.confidenceFor(text, match);
      if (confidence < this.table.minConfidence) return;

      located.push({
        index: match.index,
        order,
        finding: Object.freeze({
          event: event.event,
          severity: this.severityFor(text, event),
          confidence,
          safetyCategory: event.safetyCategory,
          detectedPhrase: excerpt(text, match.index, match.length, this.table.contextWindow),
        }),
      });
    });

    return located
      .sort((a, b) => a.index - b.index || a.order - b.order)
      .map((l) => l.finding);
  }

  private severityFor(text: string, event: CompiledEvent): Severity {
    const severe = [...this.globalSevere, ...event.severe];
    if (severe.some((p) => p.test(text))) return 'severe';

    const moderate = [...this.globalModerate, ...event.moderate];
    if (moderate.some((p) => p.test(text))) return 'moderate';

    return 'mild';
  }

  private confidenceFor(text: string, match: TriggerMatch): number {
    let negated = false;
    if (this.table.negationWindow > 0) {
      const words = text.slice(0, match.index).toLowerCase().match(/[\p{L}']+/gu) ?? [];
      negated = words.slice(-this.table.negationWindow).some((word) => this.negations.has(word));
    }

    const raw = negated
      ? match.trigger.confidence - this.table.negationPenalty
      : match.trigger.confidence;

    return round2(Math.min(1, Math.max(CONFIDENCE_FLOOR, raw)));
  }
}

function compileEvent(entry: SafetyEventEntry): CompiledEvent {
  return {
    event: entry.event,
    safetyCategory: entry.safetyCategory,
    triggers: entry.triggers.map((t) => ({
      phrase: t.phrase,
      confidence: t.confidence,
      pattern: phrasePattern(t.phrase),
    })),
    moderate: entry.severityModifiers.moderate.map(phrasePattern),
    severe: entry.severityModifiers.severe.map(phrasePattern),
  };
}

/** Case-insensitive, whole-word match; internal whitespace matches any run of spaces. */
function phrasePattern(phrase: string): RegExp {
  const body = phrase
    .trim()
    .split(/\s+/)
    .map((part) => part.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'))
    .join('\\s+');
  return new RegExp(`(?<![\\p{L}\\p{N}])${body}(?![\\p{L}\\p{N}])`, 'iu');
}

/** First occurrence of any trigger; on equal positions the longer match wins. */
function earliestMatch(triggers: CompiledTrigger[], text: string): TriggerMatch | null {
  let best: TriggerMatch | null = null;

  for (const trigger of triggers) {
    const m = trigger.pattern.exec(text);
    if (!m) continue;

    const candidate = { trigger, index: m.index, length: m[0].length };
    if (
      !best ||
      candidate.index < best.index ||
      (candidate.index === best.index && candidate.length > best.length)
    ) {
      best = candidate;
    }
  }

  return best;
}

/** Up to `window` characters either side of the match, with "..." where cut. */
function excerpt(text: string, index: number, length: number, window: number): string {
  const start = Math.max(0, index - window);
  const end = Math.min(text.length, index + length + window);

  let context = text.slice(start, end).trim();
  if (start > 0) context = `...${context}`;
  if (end < text.length) context = `${context}...`;
  return context;
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}
