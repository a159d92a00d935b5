// ── Vector backends ──────────────────────────────────────────────
export { createVectorBackend } from './backends/index.js';
export { InMemoryVectorBackend } from './backends/memory.js';
export { LanceDbVectorBackend } from './backends/lancedb.js';
export type { LanceDbBackendOptions } from './backends/lancedb.js';
export { matchesFilter, isSimilarityMetric } from './backends/types.js';
export type {
  VectorBackendClient,
  VectorPoint,
  RetrievedPoint,
  ScoredPoint,
  Payload,
  MatchValue,
  Filter,
  FilterCondition,
  CreateCollectionOptions,
  BackendCollectionInfo,
  SearchOptions,
  ScrollOptions,
  ScrollResult,
  DeleteSelector,
} from './backends/types.js';

// ── Thought store ────────────────────────────────────────────────
export { ThoughtStore } from './thought-store.js';
export type { ThoughtStoreOptions, CallOptions } from './thought-store.js';
export { KeyedMutex } from './keyed-mutex.js';
export {
  encodeThought,
  decodeThought,
  encodeRelation,
  decodeRelation,
  encodeResult,
  decodeResult,
} from './codecs.js';
export type { DecodeResult } from './codecs.js';

// ── Admin metadata database & migrations ─────────────────────────
export { openDatabase, createTestDatabase } from './database.js';
export type { DatabaseOptions } from './database.js';
export { runMigrations, getCurrentVersion } from './migrations.js';
export type { Migration } from './migrations.js';
export { allMigrations } from './migrations/index.js';

// ── Admin repositories ───────────────────────────────────────────
export { CollectionLinkRepository } from './repositories/collection-link.repository.js';
export type { CollectionLinkRow } from './repositories/collection-link.repository.js';
export { AdminAuditRepository } from './repositories/admin-audit.repository.js';
export type {
  AdminOperation,
  AdminAuditRow,
  AdminAuditEntry,
  AdminAuditInput,
} from './repositories/admin-audit.repository.js';

// ── Admin store ──────────────────────────────────────────────────

import type Database from 'better-sqlite3';
import { openDatabase } from './database.js';
import { runMigrations } from './migrations.js';
import { allMigrations } from './migrations/index.js';
import { CollectionLinkRepository } from './repositories/collection-link.repository.js';
import { AdminAuditRepository } from './repositories/admin-audit.repository.js';

export interface AdminStore {
  db: Database.Database;
  links: CollectionLinkRepository;
  audit: AdminAuditRepository;
}

/**
 * Opens the admin metadata database, applies migrations and returns its
 * repositories.
 *
 * @param dbPath - SQLite file; `:memory:` (the default) keeps everything in process.
 */
export function initializeAdminStore(dbPath = ':memory:'): AdminStore {
  const db = openDatabase({ dbPath });
  runMigrations(db, allMigrations);

  return {
    db,
    links: new CollectionLinkRepository(db),
    audit: new AdminAuditRepository(db),
  };
}
