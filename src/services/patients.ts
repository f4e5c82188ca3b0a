// Patient records and visit history

import type { TriageStore } from '../db/index.js';
import type { Logger } from '../logger.js';
import type { PatientInput, PatientUpdate } from '../models/schemas.js';
import type { Patient, Visit } from '../models/types.js';
import { AppError } from '../utils/errors.js';

export const DEFAULT_VISIT_HISTORY_LIMIT = 10;

export function fullName(patient: Pick<Patient, 'firstName' | 'lastName'>): string {
  return `${patient.firstName} ${patient.lastName}`;
}

/** Whole years between date of birth and `now` */
export function computeAge(dateOfBirth: string, now: Date): number {
  const dob = new Date(dateOfBirth);
  if (Number.isNaN(dob.getTime())) return 0;

  let age = now.getUTCFullYear() - dob.getUTCFullYear();
  const monthDiff = now.getUTCMonth() - dob.getUTCMonth();
  if (monthDiff < 0 || (monthDiff === 0 && now.getUTCDate() < dob.getUTCDate())) {
    age--;
  }
  return Math.max(0, age);
}

export class PatientService {
  constructor(
    private readonly store: TriageStore,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async create(input: PatientInput): Promise<Patient> {
    const timestamp = this.now().toISOString();
    const patient = await this.store.patients.insert({
      ...input,
      id: this.store.patients.newId(),
      createdAt: timestamp,
      updatedAt: timestamp,
    });
    this.logger.info({ patientId: patient.id }, 'Patient created');
    return patient;
  }

  async get(patientId: string): Promise<Patient> {
    const patient = await this.store.patients.get(patientId);
    if (!patient) {
      throw AppError.notFound(`Patient ${patientId} not found`);
    }
    return patient;
  }

  async update(patientId: string, patch: PatientUpdate): Promise<Patient> {
    const updated = await this.store.patients.update(patientId, {
      ...patch,
      updatedAt: this.now().toISOString(),
    });
    if (!updated) {
      throw AppError.notFound(`Patient ${patientId} not found`);
    }
    return updated;
  }

  /** Latest first */
  async listVisits(patientId: string, limit = DEFAULT_VISIT_HISTORY_LIMIT): Promise<Visit[]> {
    await this.get(patientId);
    return this.store.visits.query({
      where: { patientId },
      orderBy: [{ field: 'createdAt', direction: 'desc' }],
      limit,
    });
  }
}
