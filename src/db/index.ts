export { createInMemoryStore, InMemoryCollection } from './memory-store.js';
export type { Collection, Document, OrderBy, QueryOptions, SortDirection, TriageStore } from './types.js';
