import type { QueueEntry, SeverityLevel } from '../../models/types.js';

export type EnqueueInput = Omit<QueueEntry, 'id' | 'queuePosition' | 'estimatedWaitTime' | 'status' | 'checkedInAt'> & {
  checkedInAt?: string;
};

/** Last-known-good view of the waiting queue. Replaced on every refresh, never mutated. */
export interface QueueSnapshot {
  readonly entries: readonly QueueEntry[];
  readonly refreshedAt: string;
}

export interface SeverityUpdate {
  entry: QueueEntry;
  oldLevel: SeverityLevel;
  newLevel: SeverityLevel;
  levelChanged: boolean;
  priorityChanged: boolean;
}

export interface QueueStatistics {
  totalPatients: number;
  criticalCount: number;
  moderateCount: number;
  normalCount: number;
  averageWaitTime: number;
  queue: readonly QueueEntry[];
}

export interface LongWaitFinding {
  entry: QueueEntry;
  waitMinutes: number;
  overageMinutes: number;
  thresholdMinutes: number;
}

export type QueueChangeListener = (snapshot: QueueSnapshot) => void | Promise<void>;
