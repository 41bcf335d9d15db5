import type { Migration } from '../migrations.js';

export const vectorMigration001: Migration = {
  version: 1,
  name: 'memory-vectors',
  up(db) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS memory_vectors (
        id         TEXT PRIMARY KEY,
        user_id    TEXT NOT NULL,
        type       TEXT NOT NULL,
        slot       TEXT,
        status     TEXT NOT NULL,
        created_at TEXT NOT NULL,
        dimension  INTEGER NOT NULL,
        vector     BLOB NOT NULL
      )
    `);
    db.exec('CREATE INDEX IF NOT EXISTS idx_vectors_user ON memory_vectors(user_id)');
  },
};
