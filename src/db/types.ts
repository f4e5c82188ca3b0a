// Document store contract
// Simple key/value access plus query-by-equality with sort and limit.

import type {
  Alert,
  DeviceRegistration,
  DoctorNote,
  Patient,
  QueueEntry,
  TriageResultRecord,
  Visit,
} from '../models/types.js';

export interface Document {
  id: string;
}

export type SortDirection = 'asc' | 'desc';

export interface OrderBy<T> {
  field: keyof T & string;
  direction?: SortDirection;
}

export interface QueryOptions<T> {
  where?: Partial<T>;
  orderBy?: Array<OrderBy<T>>;
  limit?: number;
}

export interface Collection<T extends Document> {
  readonly name: string;
  newId(): string;
  insert(doc: T): Promise<T>;
  get(id: string): Promise<T | null>;
  /** Returns the updated document, or null when the id is unknown */
  update(id: string, patch: Partial<T>): Promise<T | null>;
  delete(id: string): Promise<boolean>;
  query(options?: QueryOptions<T>): Promise<T[]>;
}

export interface TriageStore {
  patients: Collection<Patient>;
  visits: Collection<Visit>;
  triageResults: Collection<TriageResultRecord>;
  queue: Collection<QueueEntry>;
  alerts: Collection<Alert>;
  doctorNotes: Collection<DoctorNote>;
  devices: Collection<DeviceRegistration>;
}
