// Symptom → severity lookup table and lexical intensifiers, loaded from data/symptom-severity.json

import { readFileSync } from 'fs';
import { z } from 'zod';

const VocabularyFileSchema = z.object({
  symptoms: z.record(z.string(), z.number().int().min(0).max(100)),
  intensifiers: z.record(z.string(), z.number().int()),
});

export interface SymptomVocabulary {
  /** Insertion order is preserved; it breaks ties between partial matches */
  symptoms: Map<string, number>;
  intensifiers: Map<string, number>;
}

const VOCABULARY_URL = new URL('../../../data/symptom-severity.json', import.meta.url);

let cached: SymptomVocabulary | null = null;

export function createVocabulary(
  symptoms: Record<string, number>,
  intensifiers: Record<string, number> = {},
): SymptomVocabulary {
  return {
    symptoms: new Map(Object.entries(symptoms).map(([k, v]) => [k.toLowerCase(), v])),
    intensifiers: new Map(Object.entries(intensifiers).map(([k, v]) => [k.toLowerCase(), v])),
  };
}

export function loadVocabulary(): SymptomVocabulary {
  if (cached) return cached;

  const raw: unknown = JSON.parse(readFileSync(VOCABULARY_URL, 'utf8'));
  const parsed = VocabularyFileSchema.parse(raw);
  cached = createVocabulary(parsed.symptoms, parsed.intensifiers);
  return cached;
}
