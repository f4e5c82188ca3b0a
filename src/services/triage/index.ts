// Rule-based triage entry point
// Runs Stage A (signal detection) then Stage B (rules engine)

import { env } from '../../env.js';
import { clampScore, isValidScore, levelForScore, priorityForLevel } from '../../models/severity.js';
import type { ConditionChange } from '../../models/types.js';
import { AppError } from '../../utils/errors.js';
import { applyRules } from './rules.js';
import { detectSignals, extractSymptoms, findEmergencyKeywords } from './signals.js';
import type { Reassessment, TriageInput, TriageResult } from './types.js';
import { loadVocabulary, type SymptomVocabulary } from './vocabulary.js';

export interface TriageOptions {
  emergencyKeywords?: readonly string[];
  vocabulary?: SymptomVocabulary;
}

const WORSENED_DELTA = 20;
const IMPROVED_DELTA = -15;

export function runTriage(input: TriageInput, options: TriageOptions = {}): TriageResult {
  const vocabulary = options.vocabulary ?? loadVocabulary();
  const keywords = options.emergencyKeywords ?? env.EMERGENCY_KEYWORDS;

  // Stage A: Detect signals from the report
  const signals = detectSignals(input, vocabulary, keywords);

  // Stage B: Apply rules to produce the assessment
  return applyRules(signals, input, vocabulary);
}

export function reassess(
  originalScore: number,
  followUpText: string,
  conditionChange: ConditionChange,
  options: TriageOptions = {},
): Reassessment {
  if (!isValidScore(originalScore)) {
    throw AppError.validationError(`Original score must be between 0 and 100, got ${originalScore}`);
  }

  const vocabulary = options.vocabulary ?? loadVocabulary();
  const keywords = options.emergencyKeywords ?? env.EMERGENCY_KEYWORDS;

  let score = originalScore;
  if (conditionChange === 'worsened') score = originalScore + WORSENED_DELTA;
  else if (conditionChange === 'improved') score = originalScore + IMPROVED_DELTA;
  score = clampScore(score);

  const reasoning = [`Follow-up reports condition ${conditionChange}: ${originalScore} → ${score}`];

  const emergencyFlags = findEmergencyKeywords(followUpText, keywords);
  if (emergencyFlags.length > 0) {
    score = 100;
    reasoning.push(`Emergency keywords detected: ${emergencyFlags.join(', ')}`);
  }

  const level = levelForScore(score);
  reasoning.push(`Reassessed severity: ${score}/100 (${level})`);

  return {
    score,
    level,
    priority: priorityForLevel(level),
    scoreChange: score - originalScore,
    detectedSymptoms: extractSymptoms(followUpText, vocabulary).slice(0, 10),
    emergencyFlags,
    reasoning: reasoning.join(' | '),
    conditionChange,
  };
}

export { analyzeVitals, describeVitalFinding, findEmergencyKeywords } from './signals.js';
export { emergencyAssessment } from './rules.js';
export { createVocabulary, loadVocabulary } from './vocabulary.js';
export type { SymptomVocabulary } from './vocabulary.js';
export type { Reassessment, TriageInput, TriageResult, TriageSignals, VitalFinding } from './types.js';
