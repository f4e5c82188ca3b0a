// Rule-based triage types

import type { Assessment, ConditionChange, Priority, SeverityLevel, VitalName, Vitals } from '../../models/types.js';

export interface TriageInput {
  symptomText: string;
  vitals: Vitals;
  duration?: string;
}

export type VitalTier = 'critical' | 'abnormal';

export interface VitalFinding {
  vital: VitalName;
  value: number;
  tier: VitalTier;
}

export type DurationCue = 'chronic' | 'acute' | null;

export interface TriageSignals {
  emergency_flags: string[];
  detected_symptoms: string[];
  vital_findings: VitalFinding[];
  duration_cue: DurationCue;
}

export interface VitalThresholds {
  criticalLow?: number;
  low?: number;
  high?: number;
  criticalHigh?: number;
}

export interface Reassessment {
  score: number;
  level: SeverityLevel;
  priority: Priority;
  scoreChange: number;
  detectedSymptoms: string[];
  emergencyFlags: string[];
  reasoning: string;
  conditionChange: ConditionChange;
}

export type TriageResult = Assessment;
