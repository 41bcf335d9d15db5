import type { Migration } from '../migrations.js';

export const migration002: Migration = {
  version: 2,
  name: 'slot-locks',
  up(db) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS slot_locks (
        user_id    TEXT NOT NULL,
        slot       TEXT NOT NULL,
        holder     TEXT NOT NULL,
        expires_at INTEGER NOT NULL,
        PRIMARY KEY (user_id, slot)
      )
    `);
  },
};
