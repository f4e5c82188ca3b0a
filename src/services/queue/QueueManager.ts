import type { TriageStore } from '../../db/index.js';
import type { Logger } from '../../logger.js';
import { priorityForLevel } from '../../models/severity.js';
import type { QueueEntry, SeverityLevel, Visit } from '../../models/types.js';
import { assertVisitTransition } from '../../models/visit-state.js';
import { AppError } from '../../utils/errors.js';
import { Mutex } from '../../utils/mutex.js';
import type {
  EnqueueInput,
  LongWaitFinding,
  QueueChangeListener,
  QueueSnapshot,
  QueueStatistics,
  SeverityUpdate,
} from './types.js';

export const BASE_WAIT_MINUTES: Record<SeverityLevel, number> = {
  critical: 0,
  moderate: 15,
  normal: 30,
};

export const MINUTES_PER_PATIENT_AHEAD = 10;

export const LONG_WAIT_THRESHOLD_MINUTES: Record<SeverityLevel, number> = {
  critical: 5,
  moderate: 30,
  normal: 60,
};

// Levels whose waiting entries count as "ahead" of a given level
const AHEAD_LEVELS: Record<SeverityLevel, SeverityLevel[]> = {
  critical: [],
  moderate: ['critical'],
  normal: ['critical', 'moderate'],
};

export function compareEntries(a: QueueEntry, b: QueueEntry): number {
  if (a.priority !== b.priority) return a.priority - b.priority;
  const byCheckIn = Date.parse(a.checkedInAt) - Date.parse(b.checkedInAt);
  if (byCheckIn !== 0) return byCheckIn;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export function computeWaitTime(level: SeverityLevel, waiting: readonly QueueEntry[]): number {
  const aheadLevels = AHEAD_LEVELS[level];
  const ahead = waiting.filter(e => aheadLevels.includes(e.severityLevel)).length;
  return BASE_WAIT_MINUTES[level] + ahead * MINUTES_PER_PATIENT_AHEAD;
}

export interface QueueManagerOptions {
  store: TriageStore;
  logger: Logger;
  now?: () => Date;
  onChange?: QueueChangeListener;
}

export class QueueManager {
  private readonly store: TriageStore;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly mutex = new Mutex();
  private listener: QueueChangeListener | null;
  private snapshot: QueueSnapshot = { entries: [], refreshedAt: new Date(0).toISOString() };

  constructor(options: QueueManagerOptions) {
    this.store = options.store;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
    this.listener = options.onChange ?? null;
  }

  /**
   * Register the hook fired after every queue mutation.
   * Realtime broadcast is wired here by the composition root.
   */
  setChangeListener(listener: QueueChangeListener | null): void {
    this.listener = listener;
  }

  getSnapshot(): QueueSnapshot {
    return this.snapshot;
  }

  /**
   * Add a waiting entry, then recompute the full order.
   */
  async enqueue(input: EnqueueInput): Promise<QueueEntry> {
    const { entry, snapshot } = await this.mutex.runExclusive(async () => {
      const waiting = await this.loadWaiting();
      const queued: QueueEntry = {
        ...input,
        id: this.store.queue.newId(),
        checkedInAt: input.checkedInAt ?? this.now().toISOString(),
        status: 'waiting',
        queuePosition: 0,
        estimatedWaitTime: computeWaitTime(input.severityLevel, waiting),
      };
      await this.store.queue.insert(queued);

      const snapshot = await this.requeueLocked();
      const entry = snapshot.entries.find(e => e.id === queued.id) ?? queued;
      return { entry, snapshot };
    });

    this.logger.info(
      { visitId: entry.visitId, level: entry.severityLevel, position: entry.queuePosition },
      'Patient added to queue',
    );
    await this.emitChange(snapshot);
    return entry;
  }

  /**
   * Re-fetch waiting entries, sort, reassign positions 1..N and wait estimates.
   * Only changed fields are written back.
   */
  async requeue(): Promise<QueueSnapshot> {
    return this.mutex.runExclusive(() => this.requeueLocked());
  }

  async updateSeverity(visitId: string, score: number, level: SeverityLevel): Promise<SeverityUpdate> {
    const { update, snapshot } = await this.mutex.runExclusive(async () => {
      const existing = await this.findActiveEntry(visitId);
      if (!existing) {
        throw AppError.notFound(`Visit ${visitId} is not in the queue`);
      }

      const priority = priorityForLevel(level);
      const updated = await this.store.queue.update(existing.id, {
        severityScore: score,
        severityLevel: level,
        priority,
      });
      if (!updated) {
        throw AppError.notFound(`Queue entry ${existing.id} disappeared`);
      }

      const snapshot = await this.requeueLocked();
      const entry = snapshot.entries.find(e => e.id === updated.id) ?? updated;

      const update: SeverityUpdate = {
        entry,
        oldLevel: existing.severityLevel,
        newLevel: level,
        levelChanged: existing.severityLevel !== level,
        priorityChanged: existing.priority !== priority,
      };
      return { update, snapshot };
    });

    if (update.levelChanged) {
      this.logger.info({ visitId, from: update.oldLevel, to: update.newLevel }, 'Queue severity changed');
    }
    await this.emitChange(snapshot);
    return update;
  }

  /**
   * waiting → in_progress. The visit is updated alongside the entry.
   */
  async callPatient(visitId: string, doctorId: string): Promise<QueueEntry> {
    const { entry, snapshot } = await this.mutex.runExclusive(async () => {
      const [existing, visit] = await Promise.all([this.findActiveEntry(visitId), this.store.visits.get(visitId)]);
      if (!existing || !visit) {
        throw AppError.notFound(`Visit ${visitId} is not in the queue`);
      }
      if (existing.status !== 'waiting') {
        throw AppError.conflict(`Visit ${visitId} has already been called`);
      }
      assertVisitTransition(visitId, visit.status, 'in_progress');

      const timestamp = this.now().toISOString();
      const [entry] = await Promise.all([
        this.store.queue.update(existing.id, {
          status: 'in_progress',
          calledAt: timestamp,
          assignedDoctorId: doctorId,
          queuePosition: 0,
        }),
        this.store.visits.update(visitId, {
          status: 'in_progress',
          assignedDoctorId: doctorId,
          updatedAt: timestamp,
        }),
      ]);

      const snapshot = await this.requeueLocked();
      return { entry: entry ?? existing, snapshot };
    });

    this.logger.info({ visitId, doctorId }, 'Patient called');
    await this.emitChange(snapshot);
    return entry;
  }

  /**
   * Remove the entry and mark the visit completed. Visits that never made it
   * into the queue are still completed.
   */
  async completeVisit(visitId: string): Promise<Visit> {
    const { visit, snapshot } = await this.mutex.runExclusive(async () => {
      const visit = await this.store.visits.get(visitId);
      if (!visit) {
        throw AppError.notFound(`Visit ${visitId} not found`);
      }
      assertVisitTransition(visitId, visit.status, 'completed');

      const entry = await this.findActiveEntry(visitId);
      if (entry) {
        await this.store.queue.delete(entry.id);
      }

      const timestamp = this.now().toISOString();
      const updated = await this.store.visits.update(visitId, {
        status: 'completed',
        completedAt: timestamp,
        updatedAt: timestamp,
      });

      const snapshot = await this.requeueLocked();
      return { visit: updated ?? visit, snapshot };
    });

    this.logger.info({ visitId }, 'Visit completed');
    await this.emitChange(snapshot);
    return visit;
  }

  async estimateWaitTime(level: SeverityLevel): Promise<number> {
    return this.mutex.runExclusive(async () => {
      const snapshot = await this.refreshLocked();
      return computeWaitTime(level, snapshot.entries);
    });
  }

  async getStatistics(): Promise<QueueStatistics> {
    const snapshot = await this.requeue();
    const entries = snapshot.entries;
    const count = (level: SeverityLevel) => entries.filter(e => e.severityLevel === level).length;
    const totalWait = entries.reduce((sum, e) => sum + e.estimatedWaitTime, 0);

    return {
      totalPatients: entries.length,
      criticalCount: count('critical'),
      moderateCount: count('moderate'),
      normalCount: count('normal'),
      averageWaitTime: entries.length > 0 ? Math.floor(totalWait / entries.length) : 0,
      queue: entries,
    };
  }

  async findLongWaiting(): Promise<LongWaitFinding[]> {
    const snapshot = await this.mutex.runExclusive(() => this.refreshLocked());
    const nowMs = this.now().getTime();
    const findings: LongWaitFinding[] = [];

    for (const entry of snapshot.entries) {
      const elapsed = (nowMs - Date.parse(entry.checkedInAt)) / 60000;
      const threshold = LONG_WAIT_THRESHOLD_MINUTES[entry.severityLevel];
      if (elapsed > threshold) {
        findings.push({
          entry,
          waitMinutes: Math.floor(elapsed),
          overageMinutes: Math.floor(elapsed - threshold),
          thresholdMinutes: threshold,
        });
      }
    }

    return findings;
  }

  async getEntryByVisit(visitId: string): Promise<QueueEntry | null> {
    return this.findActiveEntry(visitId);
  }

  private async findActiveEntry(visitId: string): Promise<QueueEntry | null> {
    const [entry] = await this.store.queue.query({ where: { visitId }, limit: 1 });
    return entry ?? null;
  }

  private async loadWaiting(): Promise<QueueEntry[]> {
    const entries = await this.store.queue.query({ where: { status: 'waiting' } });
    return entries.sort(compareEntries);
  }

  // Read-only refresh; caller holds the mutex
  private async refreshLocked(): Promise<QueueSnapshot> {
    const entries = await this.loadWaiting();
    this.snapshot = { entries, refreshedAt: this.now().toISOString() };
    return this.snapshot;
  }

  // Caller holds the mutex
  private async requeueLocked(): Promise<QueueSnapshot> {
    const waiting = await this.loadWaiting();
    const entries: QueueEntry[] = [];

    for (const [index, entry] of waiting.entries()) {
      const queuePosition = index + 1;
      const estimatedWaitTime = computeWaitTime(entry.severityLevel, waiting);

      const patch: Partial<QueueEntry> = {};
      if (entry.queuePosition !== queuePosition) patch.queuePosition = queuePosition;
      if (entry.estimatedWaitTime !== estimatedWaitTime) patch.estimatedWaitTime = estimatedWaitTime;
      if (Object.keys(patch).length > 0) {
        await this.store.queue.update(entry.id, patch);
      }

      entries.push({ ...entry, queuePosition, estimatedWaitTime });
    }

    this.snapshot = { entries, refreshedAt: this.now().toISOString() };
    return this.snapshot;
  }

  private async emitChange(snapshot: QueueSnapshot): Promise<void> {
    if (!this.listener) return;
    try {
      await this.listener(snapshot);
    } catch (err) {
      this.logger.warn({ err }, 'Queue change listener failed');
    }
  }
}
