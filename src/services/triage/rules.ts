// Stage B: Rules Engine
// Apply deterministic scoring rules to signals → produce an Assessment

import { clampScore, levelForScore, priorityForLevel, recommendationForLevel } from '../../models/severity.js';
import type { Assessment } from '../../models/types.js';
import { analyzeVitals, describeVitalFinding } from './signals.js';
import type { DurationCue, TriageInput, TriageSignals } from './types.js';
import type { SymptomVocabulary } from './vocabulary.js';

export const EMERGENCY_RECOMMENDATION = 'IMMEDIATE EMERGENCY CARE REQUIRED';

const INTENSIFIER_BASE = 30;
const INTENSIFIER_MAX = 70;
const SYMPTOM_WEIGHT = 0.7;
const VITAL_WEIGHT = 0.3;
const CHRONIC_CAP = 65;
const ACUTE_BOOST = 10;
const MIN_CONTAINED_PHRASE_LENGTH = 5;
const MAX_REPORTED_SYMPTOMS = 10;
const MAX_REASONING_SYMPTOMS = 5;

/**
 * Severity for a single phrase. Exact match first; then the most severe known
 * symptom contained in the phrase; then the least severe known symptom that
 * contains the phrase ("headache" should not score as "severe headache").
 */
export function matchSymptomSeverity(symptom: string, vocabulary: SymptomVocabulary): number | null {
  const exact = vocabulary.symptoms.get(symptom);
  if (exact !== undefined) return exact;

  let contained: number | null = null;
  for (const [known, severity] of vocabulary.symptoms) {
    if (symptom.includes(known)) {
      contained = contained === null ? severity : Math.max(contained, severity);
    }
  }
  if (contained !== null) return contained;

  if (symptom.length < MIN_CONTAINED_PHRASE_LENGTH) return null;

  let containing: number | null = null;
  for (const [known, severity] of vocabulary.symptoms) {
    if (known.includes(symptom)) {
      containing = containing === null ? severity : Math.min(containing, severity);
    }
  }
  return containing;
}

export function scoreIntensifiers(text: string, vocabulary: SymptomVocabulary): number {
  const lower = text.toLowerCase();
  let score = INTENSIFIER_BASE;

  for (const [word, delta] of vocabulary.intensifiers) {
    if (new RegExp(`\\b${word}\\b`).test(lower)) {
      score += delta;
    }
  }

  return Math.max(0, Math.min(INTENSIFIER_MAX, score));
}

export function scoreSymptoms(
  symptoms: string[],
  text: string,
  vocabulary: SymptomVocabulary,
): { score: number; matched: number } {
  const severities: number[] = [];
  for (const symptom of symptoms) {
    const severity = matchSymptomSeverity(symptom, vocabulary);
    if (severity !== null) severities.push(severity);
  }

  if (severities.length === 0) {
    return { score: scoreIntensifiers(text, vocabulary), matched: 0 };
  }

  const max = Math.max(...severities);
  const mean = severities.reduce((sum, s) => sum + s, 0) / severities.length;
  return { score: Math.trunc(SYMPTOM_WEIGHT * max + VITAL_WEIGHT * mean), matched: severities.length };
}

export function combineScores(symptomScore: number, vitalScore: number): number {
  return Math.round(SYMPTOM_WEIGHT * symptomScore + VITAL_WEIGHT * vitalScore);
}

export function applyDurationModifier(total: number, cue: DurationCue): number {
  if (cue === 'chronic') return Math.min(total, CHRONIC_CAP);
  if (cue === 'acute') return Math.min(total + ACUTE_BOOST, 100);
  return total;
}

export function emergencyAssessment(flags: string[]): Assessment {
  return {
    score: 100,
    level: 'critical',
    priority: 1,
    detectedSymptoms: [...flags],
    emergencyFlags: [...flags],
    vitalAbnormalities: [],
    reasoning: `Emergency keywords detected: ${flags.join(', ')}. Immediate medical attention required.`,
    ruleBasedOverride: true,
    recommendation: EMERGENCY_RECOMMENDATION,
    source: 'rules',
  };
}

export function applyRules(signals: TriageSignals, input: TriageInput, vocabulary: SymptomVocabulary): Assessment {
  // Hard short-circuit: nothing may downgrade an emergency keyword
  if (signals.emergency_flags.length > 0) {
    return emergencyAssessment(signals.emergency_flags);
  }

  const symptoms = signals.detected_symptoms;
  const symptomScore = scoreSymptoms(symptoms, input.symptomText, vocabulary).score;
  const vitalScore = analyzeVitals(input.vitals).score;
  const abnormalities = signals.vital_findings.map(describeVitalFinding);

  const total = clampScore(applyDurationModifier(combineScores(symptomScore, vitalScore), signals.duration_cue));
  const level = levelForScore(total);

  const reasoning = [`Symptom analysis score: ${symptomScore}/100`];
  reasoning.push(
    abnormalities.length > 0
      ? `Vital signs score: ${vitalScore}/50 (${abnormalities.join(', ')})`
      : 'Vital signs within normal range',
  );
  if (symptoms.length > 0) {
    reasoning.push(`Detected symptoms: ${symptoms.slice(0, MAX_REASONING_SYMPTOMS).join(', ')}`);
  }
  if (signals.duration_cue === 'chronic') {
    reasoning.push(`Chronic presentation: score capped at ${CHRONIC_CAP}`);
  } else if (signals.duration_cue === 'acute') {
    reasoning.push(`Sudden onset: score increased by ${ACUTE_BOOST}`);
  }
  reasoning.push(`Final severity assessment: ${total}/100 (${level})`);

  return {
    score: total,
    level,
    priority: priorityForLevel(level),
    detectedSymptoms: symptoms.slice(0, MAX_REPORTED_SYMPTOMS),
    emergencyFlags: [],
    vitalAbnormalities: abnormalities,
    reasoning: reasoning.join(' | '),
    ruleBasedOverride: false,
    recommendation: recommendationForLevel(level),
    source: 'rules',
    components: { symptomScore, vitalScore },
  };
}
