// Visit lifecycle
//
// Valid transitions:
// - waiting → in_progress (patient called by a doctor)
// - waiting → completed (visit closed without a call, e.g. notes saved directly)
// - in_progress → completed (consultation done)
// completed is terminal.

import { AppError } from '../utils/errors.js';
import type { VisitStatus } from './types.js';

const TRANSITIONS: Record<VisitStatus, VisitStatus[]> = {
  waiting: ['in_progress', 'completed'],
  in_progress: ['completed'],
  completed: [],
};

export function canTransition(from: VisitStatus, to: VisitStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertVisitTransition(visitId: string, from: VisitStatus, to: VisitStatus): void {
  if (!canTransition(from, to)) {
    throw AppError.conflict(`Visit ${visitId} cannot move from ${from} to ${to}`, { visitId, from, to });
  }
}

export function isTerminal(status: VisitStatus): boolean {
  return TRANSITIONS[status].length === 0;
}
