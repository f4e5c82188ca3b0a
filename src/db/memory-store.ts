// In-memory document store
// Used for local development and tests. Every read and write goes through
// structuredClone so callers never share references with stored documents.

import { randomUUID } from 'crypto';
import type { Collection, Document, QueryOptions, TriageStore } from './types.js';

function compareValues(a: unknown, b: unknown): number {
  if (a === b) return 0;
  if (a === undefined || a === null) return -1;
  if (b === undefined || b === null) return 1;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
  return String(a) < String(b) ? -1 : 1;
}

function matchesWhere(doc: object, where: object): boolean {
  for (const [key, expected] of Object.entries(where)) {
    if (expected === undefined) continue;
    const actual: unknown = Reflect.get(doc, key);
    if (actual !== expected) return false;
  }
  return true;
}

export class InMemoryCollection<T extends Document> implements Collection<T> {
  private docs = new Map<string, T>();

  constructor(public readonly name: string) {}

  newId(): string {
    return randomUUID();
  }

  async insert(doc: T): Promise<T> {
    if (this.docs.has(doc.id)) {
      throw new Error(`Document ${this.name}/${doc.id} already exists`);
    }
    this.docs.set(doc.id, structuredClone(doc));
    return structuredClone(doc);
  }

  async get(id: string): Promise<T | null> {
    const doc = this.docs.get(id);
    return doc ? structuredClone(doc) : null;
  }

  async update(id: string, patch: Partial<T>): Promise<T | null> {
    const existing = this.docs.get(id);
    if (!existing) return null;

    const updated: T = { ...existing, ...structuredClone(patch), id };
    this.docs.set(id, updated);
    return structuredClone(updated);
  }

  async delete(id: string): Promise<boolean> {
    return this.docs.delete(id);
  }

  async query(options: QueryOptions<T> = {}): Promise<T[]> {
    const { where, orderBy = [], limit } = options;

    let results = Array.from(this.docs.values());
    if (where) {
      results = results.filter(doc => matchesWhere(doc, where));
    }

    if (orderBy.length > 0) {
      results.sort((a, b) => {
        for (const { field, direction = 'asc' } of orderBy) {
          const cmp = compareValues(a[field], b[field]);
          if (cmp !== 0) return direction === 'asc' ? cmp : -cmp;
        }
        return 0;
      });
    }

    if (limit !== undefined) {
      results = results.slice(0, limit);
    }

    return results.map(doc => structuredClone(doc));
  }

  get size(): number {
    return this.docs.size;
  }
}

export function createInMemoryStore(): TriageStore {
  return {
    patients: new InMemoryCollection('patients'),
    visits: new InMemoryCollection('visits'),
    triageResults: new InMemoryCollection('triage_results'),
    queue: new InMemoryCollection('queue'),
    alerts: new InMemoryCollection('alerts'),
    doctorNotes: new InMemoryCollection('doctor_notes'),
    devices: new InMemoryCollection('devices'),
  };
}
