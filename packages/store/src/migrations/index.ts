import type { Migration } from '../migrations.js';
import { migration001 } from './001-initial-schema.js';
import { migration002 } from './002-slot-locks.js';
import { vectorMigration001 } from './vector-001-embeddings.js';

/** Migrations for the metadata database (source of truth). */
export const allMigrations: Migration[] = [migration001, migration002];

/** Migrations for the SQLite vector index, which lives in its own file. */
export const vectorMigrations: Migration[] = [vectorMigration001];
