// Shared builders for tests
import { pino } from 'pino';
import type { TriageStore } from '../db/index.js';
import type { Logger } from '../logger.js';
import { priorityForLevel } from '../models/severity.js';
import type { Patient, SeverityLevel, Visit } from '../models/types.js';
import type { EnqueueInput } from '../services/queue/index.js';
import type { MulticastResult, PushMessage, PushTransport } from '../services/notifications/index.js';

export const silentLogger: Logger = pino({ level: 'silent' });

export interface TestClock {
  now: () => Date;
  advanceMinutes(minutes: number): void;
  set(iso: string): void;
}

export function createClock(start = '2026-03-01T09:00:00.000Z'): TestClock {
  let current = new Date(start).getTime();
  return {
    now: () => new Date(current),
    advanceMinutes(minutes: number) {
      current += minutes * 60_000;
    },
    set(iso: string) {
      current = new Date(iso).getTime();
    },
  };
}

export async function insertPatient(store: TriageStore, overrides: Partial<Patient> = {}): Promise<Patient> {
  return store.patients.insert({
    id: store.patients.newId(),
    firstName: 'Ada',
    lastName: 'Moreau',
    phone: '555-0100',
    dateOfBirth: '1990-06-15',
    gender: 'female',
    medicalHistory: [],
    allergies: [],
    currentMedications: [],
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  });
}

export async function insertVisit(store: TriageStore, patientId: string, overrides: Partial<Visit> = {}): Promise<Visit> {
  return store.visits.insert({
    id: store.visits.newId(),
    patientId,
    chiefComplaint: 'Headache',
    symptoms: { symptomText: 'mild headache for two days' },
    vitals: {},
    status: 'waiting',
    triageScore: 18,
    severityLevel: 'normal',
    latestTriageResultId: null,
    assignedDoctorId: null,
    createdAt: '2026-03-01T09:00:00.000Z',
    updatedAt: '2026-03-01T09:00:00.000Z',
    completedAt: null,
    ...overrides,
  });
}

export function enqueueInput(
  visitId: string,
  level: SeverityLevel,
  overrides: Partial<EnqueueInput> = {},
): EnqueueInput {
  const score = level === 'critical' ? 85 : level === 'moderate' ? 50 : 20;
  return {
    visitId,
    patientId: `patient-${visitId}`,
    patientName: `Patient ${visitId}`,
    age: 40,
    severityScore: score,
    severityLevel: level,
    priority: priorityForLevel(level),
    chiefComplaint: 'Complaint',
    symptomsSummary: 'Symptoms',
    vitalSigns: {},
    emergencyFlags: [],
    ...overrides,
  };
}

/** Push transport that records messages instead of sending them */
export class RecordingTransport implements PushTransport {
  readonly name = 'recording';
  readonly sent: Array<{ tokens: string[]; message: PushMessage }> = [];
  failWith: Error | null = null;

  async sendToToken(token: string, message: PushMessage): Promise<boolean> {
    const result = await this.sendToMany([token], message);
    return result.successCount === 1;
  }

  async sendToMany(tokens: string[], message: PushMessage): Promise<MulticastResult> {
    if (this.failWith) throw this.failWith;
    this.sent.push({ tokens, message });
    return { successCount: tokens.length, failureCount: 0 };
  }
}
