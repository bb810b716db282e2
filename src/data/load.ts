/**
 * Loaders for the JSON tables shipped in src/data.
 * The bundled tables are imported as JSON modules so a bundler inlines them;
 * only an operator-supplied deny-list is read from disk. Every table is
 * schema-checked once; callers hold on to the result.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import bundledDenyList from './deny-list.json' with { type: 'json' };
import bundledLanguageIndicators from './language-indicators.json' with { type: 'json' };
import bundledSafetyEvents from './safety-events.json' with { type: 'json' };

const severityModifiersSchema = z.object({
  moderate: z.array(z.string().min(1)).default([]),
  severe: z.array(z.string().min(1)).default([]),
});

export const SafetyTableSchema = z.object({
  contextWindow: z.number().int().min(0),
  minConfidence: z.number().min(0).max(1),
  negationPenalty: z.number().min(0).max(1),
  negationWindow: z.number().int().min(0),
  negations: z.array(z.string().min(1)),
  intensityModifiers: severityModifiersSchema,
  events: z.array(
    z.object({
      event: z.string().min(1),
      safetyCategory: z.string().min(1),
      triggers: z
        .array(
          z.object({
            phrase: z.string().min(1),
            confidence: z.number().min(0).max(1),
          })
        )
        .min(1),
      severityModifiers: severityModifiersSchema,
    })
  ),
});

export type SafetyTable = z.infer<typeof SafetyTableSchema>;
export type SafetyEventEntry = SafetyTable['events'][number];

export const DenyListSchema = z.object({
  entries: z.array(
    z.object({
      pattern: z.string().min(1),
      label: z.string().min(1),
    })
  ),
});

export type DenyList = z.infer<typeof DenyListSchema>;

export const LanguageIndicatorsSchema = z.object({
  english: z.array(z.string().min(1)),
  spanish: z.array(z.string().min(1)),
  french: z.array(z.string().min(1)),
  markers: z.object({
    spanish: z.array(z.string().min(1)),
    french: z.array(z.string().min(1)),
  }),
});

export type LanguageIndicators = z.infer<typeof LanguageIndicatorsSchema>;

/** Read and validate a JSON file. Throws with the file name on any problem. */
export function readJsonFile<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  return checked(path, JSON.parse(readFileSync(path, 'utf8')), schema);
}

function checked<T>(source: string, raw: unknown, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid data file ${source}: ${parsed.error.message}`);
  }
  return parsed.data;
}

export function loadSafetyTable(): SafetyTable {
  return checked('safety-events.json', bundledSafetyEvents, SafetyTableSchema);
}

/** The bundled deny-list, or the file at `path` in its place. */
export function loadDenyList(path?: string): DenyList {
  return path
    ? readJsonFile(path, DenyListSchema)
    : checked('deny-list.json', bundledDenyList, DenyListSchema);
}

export function loadLanguageIndicators(): LanguageIndicators {
  return checked('language-indicators.json', bundledLanguageIndicators, LanguageIndicatorsSchema);
}
