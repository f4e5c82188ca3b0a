// Score → level → priority. The only place these mappings live.
import type { Priority, SeverityLevel } from './types.js';

export const CRITICAL_MIN = 70;
export const MODERATE_MIN = 40;

export const MAX_SCORE = 100;
export const MIN_SCORE = 0;

export function levelForScore(score: number): SeverityLevel {
  if (score >= CRITICAL_MIN) return 'critical';
  if (score >= MODERATE_MIN) return 'moderate';
  return 'normal';
}

export function priorityForLevel(level: SeverityLevel): Priority {
  switch (level) {
    case 'critical':
      return 1;
    case 'moderate':
      return 2;
    case 'normal':
      return 3;
  }
}

export function recommendationForLevel(level: SeverityLevel): string {
  switch (level) {
    case 'critical':
      return 'Immediate medical attention required. Priority patient.';
    case 'moderate':
      return 'Medical evaluation needed soon. Moderate priority.';
    case 'normal':
      return 'Standard consultation. Can wait for available slot.';
  }
}

export function clampScore(score: number): number {
  return Math.max(MIN_SCORE, Math.min(MAX_SCORE, score));
}

export function isValidScore(score: number): boolean {
  return Number.isFinite(score) && score >= MIN_SCORE && score <= MAX_SCORE;
}
