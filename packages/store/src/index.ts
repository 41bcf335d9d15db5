// ── Database & Migrations ────────────────────────────────────────
export { openDatabase, createTestDatabase } from './database.js';
export type { DatabaseOptions } from './database.js';
export { runMigrations, getCurrentVersion } from './migrations.js';
export type { Migration } from './migrations.js';
export { allMigrations, vectorMigrations } from './migrations/index.js';

// ── Metadata ─────────────────────────────────────────────────────
export { MemoryRepository, parseMemoryRow } from './repositories/memory.repository.js';
export type { MemoryRow } from './repositories/memory.repository.js';
export { SqliteMetadataStore } from './sqlite-metadata-store.js';
export { SqliteSlotLock } from './sqlite-slot-lock.js';
export type { SlotLockOptions } from './sqlite-slot-lock.js';

// ── Vector index ─────────────────────────────────────────────────
export { SqliteVectorIndex } from './vector/sqlite-vector-index.js';
export type { SqliteVectorIndexOptions } from './vector/sqlite-vector-index.js';
export { QdrantVectorIndex } from './vector/qdrant-vector-index.js';
export type { QdrantVectorIndexOptions } from './vector/qdrant-vector-index.js';
export { cosineSimilarity, dotProduct, similarity } from './vector/similarity.js';
export type { DistanceMetric } from './vector/similarity.js';

// ── Store ────────────────────────────────────────────────────────

import type Database from 'better-sqlite3';
import type { StoreConfig, VectorConfig, VectorIndex } from '@tempora/shared';
import { openDatabase } from './database.js';
import { runMigrations } from './migrations.js';
import { allMigrations, vectorMigrations } from './migrations/index.js';
import { MemoryRepository } from './repositories/memory.repository.js';
import { SqliteMetadataStore } from './sqlite-metadata-store.js';
import { SqliteSlotLock } from './sqlite-slot-lock.js';
import { SqliteVectorIndex } from './vector/sqlite-vector-index.js';
import { QdrantVectorIndex } from './vector/qdrant-vector-index.js';

export interface TemporaStore {
  db: Database.Database;
  memories: MemoryRepository;
  metadata: SqliteMetadataStore;
  slotLock: SqliteSlotLock;
  vectorIndex: VectorIndex;
  close(): void;
}

/**
 * Open the metadata database and the configured vector index, run
 * migrations, and return everything the engine needs.
 */
export function initializeStore(config: { store: StoreConfig; vector: VectorConfig }): TemporaStore {
  const db = openDatabase({ dbPath: config.store.metadataPath });
  runMigrations(db, allMigrations);

  let vectorDb: Database.Database | null = null;
  let vectorIndex: VectorIndex;

  if (config.vector.backend === 'qdrant') {
    vectorIndex = new QdrantVectorIndex({
      ...config.vector.qdrant,
      dimension: config.vector.dimension,
      distance: config.vector.distance,
    });
  } else {
    vectorDb = openDatabase({ dbPath: config.vector.sqlitePath });
    runMigrations(vectorDb, vectorMigrations);
    vectorIndex = new SqliteVectorIndex(vectorDb, {
      dimension: config.vector.dimension,
      distance: config.vector.distance,
    });
  }

  const memories = new MemoryRepository(db);

  return {
    db,
    memories,
    metadata: new SqliteMetadataStore(memories),
    slotLock: new SqliteSlotLock(db, {
      leaseMs: config.store.lockLeaseMs,
      waitMs: config.store.lockWaitMs,
    }),
    vectorIndex,
    close() {
      db.close();
      vectorDb?.close();
    },
  };
}
