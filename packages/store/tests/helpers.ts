import { createTestDatabase } from '../src/database.js';
import { runMigrations } from '../src/migrations.js';
import { allMigrations, vectorMigrations } from '../src/migrations/index.js';
import type { MemoryRecord } from '@tempora/shared';
import type Database from 'better-sqlite3';

/** Create a fresh in-memory metadata database with all migrations applied. */
export function freshDb(): Database.Database {
  const db = createTestDatabase();
  runMigrations(db, allMigrations);
  return db;
}

/** Create a fresh in-memory vector database. */
export function freshVectorDb(): Database.Database {
  const db = createTestDatabase();
  runMigrations(db, vectorMigrations);
  return db;
}

export function makeRecord(overrides: Partial<MemoryRecord> = {}): MemoryRecord {
  return {
    id: 'mem-001',
    userId: 'u1',
    text: 'User likes pizza',
    type: 'preference',
    slot: 'favorite_food',
    status: 'active',
    createdAt: '2024-01-01T00:00:00.000Z',
    validUntil: null,
    decayHalfLifeDays: null,
    confidence: 0.9,
    supersedes: [],
    sourceTurnId: null,
    extra: {},
    version: 1,
    ...overrides,
  };
}
