// Stage A: Signal Detection
// Detect emergency keywords, symptom phrases, vital abnormalities and duration cues
// without external calls

import type { VitalName, Vitals } from '../../models/types.js';
import type { DurationCue, TriageInput, TriageSignals, VitalFinding, VitalThresholds } from './types.js';
import type { SymptomVocabulary } from './vocabulary.js';

// Phrase boundaries: punctuation and connectives
const SEGMENT_SPLIT_REGEX = /[.,;:!?\n()]+|\b(?:and|but|or|with|for|since|after|because|also|then|while|plus)\b/;
const WORD_REGEX = /[a-z][a-z'-]*/g;
const TIME_WORD_REGEX = /\b(?:days?|weeks?|months?|years?|hours?|minutes?|yesterday|today|tonight|morning|evening|night|ago)\b/;

const CHRONIC_REGEX = /\b(?:chronic|weeks|months)\b/i;
const ACUTE_REGEX = /\b(?:sudden|suddenly|acute)\b/i;

const MAX_PHRASE_WORDS = 4;

const LEADING_FILLER = new Set([
  'i', "i'm", 'im', "i've", 'ive', 'have', 'has', 'had', 'having', 'a', 'an', 'the', 'my', 'some',
  'been', 'feel', 'feeling', 'am', 'is', 'it', "it's", 'its', 'there', 'got', 'get', 'getting',
  'really', 'very', 'still', 'just', 'experiencing', 'suffering', 'from', 'of', 'now', 'also',
]);

export const VITAL_THRESHOLDS: Partial<Record<VitalName, VitalThresholds>> = {
  temperature: { criticalLow: 35.5, low: 36.0, high: 38.0, criticalHigh: 39.5 },
  heartRate: { criticalLow: 50, low: 60, high: 100, criticalHigh: 120 },
  bloodPressureSystolic: { criticalLow: 90, low: 100, high: 140, criticalHigh: 180 },
  bloodPressureDiastolic: { criticalLow: 60, low: 70, high: 90, criticalHigh: 110 },
  respiratoryRate: { criticalLow: 10, low: 12, high: 20, criticalHigh: 30 },
  // SpO2 has no upper bound: 100% is normal
  oxygenSaturation: { criticalLow: 90, low: 95 },
};

const VITAL_LABELS: Record<VitalName, string> = {
  temperature: 'temperature',
  heartRate: 'heart rate',
  bloodPressureSystolic: 'systolic blood pressure',
  bloodPressureDiastolic: 'diastolic blood pressure',
  respiratoryRate: 'respiratory rate',
  oxygenSaturation: 'oxygen saturation',
  weight: 'weight',
  height: 'height',
};

export const CRITICAL_VITAL_POINTS = 30;
export const ABNORMAL_VITAL_POINTS = 15;
export const MAX_VITAL_SCORE = 50;

export function findEmergencyKeywords(text: string, keywords: readonly string[]): string[] {
  const lower = text.toLowerCase();
  return keywords.filter(keyword => lower.includes(keyword.toLowerCase()));
}

function extractPhrases(text: string): string[] {
  const phrases: string[] = [];

  for (const segment of text.toLowerCase().split(SEGMENT_SPLIT_REGEX)) {
    if (!segment) continue;
    const words = segment.match(WORD_REGEX) ?? [];

    let start = 0;
    while (start < words.length && LEADING_FILLER.has(words[start] ?? '')) {
      start++;
    }
    const kept = words.slice(start);

    if (kept.length === 0 || kept.length > MAX_PHRASE_WORDS) continue;
    const phrase = kept.join(' ');
    if (phrase.length < 3 || TIME_WORD_REGEX.test(phrase)) continue;
    phrases.push(phrase);
  }

  return phrases;
}

/**
 * Deduplicated symptom phrases: short phrases pulled from the free text,
 * followed by every known symptom that appears verbatim in it.
 */
export function extractSymptoms(text: string, vocabulary: SymptomVocabulary): string[] {
  const lower = text.toLowerCase();
  const symptoms = new Set(extractPhrases(text));

  for (const known of vocabulary.symptoms.keys()) {
    if (lower.includes(known)) {
      symptoms.add(known);
    }
  }

  return Array.from(symptoms);
}

function classifyVital(value: number, thresholds: VitalThresholds): VitalFinding['tier'] | null {
  const { criticalLow, low, high, criticalHigh } = thresholds;
  if ((criticalLow !== undefined && value <= criticalLow) || (criticalHigh !== undefined && value >= criticalHigh)) {
    return 'critical';
  }
  if ((low !== undefined && value <= low) || (high !== undefined && value >= high)) {
    return 'abnormal';
  }
  return null;
}

export function analyzeVitals(vitals: Vitals): { score: number; findings: VitalFinding[] } {
  const findings: VitalFinding[] = [];
  let score = 0;

  for (const [vital, thresholds] of Object.entries(VITAL_THRESHOLDS) as Array<[VitalName, VitalThresholds]>) {
    const value = vitals[vital];
    if (value === undefined || value === null) continue;

    const tier = classifyVital(value, thresholds);
    if (!tier) continue;

    score += tier === 'critical' ? CRITICAL_VITAL_POINTS : ABNORMAL_VITAL_POINTS;
    findings.push({ vital, value, tier });
  }

  return { score: Math.min(score, MAX_VITAL_SCORE), findings };
}

export function describeVitalFinding(finding: VitalFinding): string {
  const prefix = finding.tier === 'critical' ? 'Critical' : 'Abnormal';
  return `${prefix} ${VITAL_LABELS[finding.vital]}: ${finding.value}`;
}

export function detectDurationCue(text: string): DurationCue {
  if (CHRONIC_REGEX.test(text)) return 'chronic';
  if (ACUTE_REGEX.test(text)) return 'acute';
  return null;
}

export function detectSignals(
  input: TriageInput,
  vocabulary: SymptomVocabulary,
  emergencyKeywords: readonly string[],
): TriageSignals {
  const durationText = input.duration?.trim() ? input.duration : input.symptomText;

  return {
    emergency_flags: findEmergencyKeywords(input.symptomText, emergencyKeywords),
    detected_symptoms: extractSymptoms(input.symptomText, vocabulary),
    vital_findings: analyzeVitals(input.vitals).findings,
    duration_cue: detectDurationCue(durationText),
  };
}
