export { initializeDatabase, closeDatabase, type SqliteDatabase } from './database.js';
export {
  SqliteReferenceDataset,
  normalizeCode,
  formatCode,
  type ReferenceDataset,
  type ReferenceEntry
} from './reference-dataset.js';
export { SqliteAttemptStore, type AttemptStore, type AttemptOutcome } from './attempt-store.js';
export {
  SqliteMemoryStore,
  normalizeDescription,
  descriptionTokens,
  reinforce,
  LEARNED_CONFIDENCE,
  MAX_CONFIDENCE,
  type MemoryStore
} from './memory-store.js';
export { loadReferenceFile, parseReferenceRecords } from './reference-loader.js';
