import type { Migration } from '../migrations.js';

export const migration001: Migration = {
  version: 1,
  name: 'memory-schema',
  up(db) {
    // ── Memories ─────────────────────────────────────────────
    db.exec(`
      CREATE TABLE IF NOT EXISTS memories (
        id                   TEXT PRIMARY KEY,
        user_id              TEXT NOT NULL,
        text                 TEXT NOT NULL,
        type                 TEXT NOT NULL CHECK (type IN
                               ('profile_fact', 'preference', 'episodic_event', 'temp_state', 'task_state', 'other')),
        slot                 TEXT,
        status               TEXT NOT NULL DEFAULT 'active' CHECK (status IN ('active', 'archived', 'deleted')),
        created_at           TEXT NOT NULL,
        valid_until          TEXT,
        decay_half_life_days INTEGER CHECK (decay_half_life_days IS NULL OR decay_half_life_days > 0),
        confidence           REAL NOT NULL CHECK (confidence >= 0 AND confidence <= 1),
        source_turn_id       TEXT,
        extra                TEXT NOT NULL DEFAULT '{}',
        version              INTEGER NOT NULL DEFAULT 1,
        CHECK (valid_until IS NULL OR valid_until >= created_at)
      )
    `);
    db.exec('CREATE INDEX IF NOT EXISTS idx_memories_user_status ON memories(user_id, status)');
    db.exec(`
      CREATE UNIQUE INDEX IF NOT EXISTS idx_memories_active_slot
        ON memories(user_id, slot) WHERE status = 'active' AND slot IS NOT NULL
    `);
    db.exec('CREATE INDEX IF NOT EXISTS idx_memories_created ON memories(created_at)');

    // Status only moves forward out of 'active'; identity columns never change.
    db.exec(`
      CREATE TRIGGER IF NOT EXISTS trg_memories_status_forward
      BEFORE UPDATE OF status ON memories
      WHEN OLD.status <> NEW.status AND OLD.status <> 'active'
      BEGIN
        SELECT RAISE(ABORT, 'memory status transitions are forward-only');
      END
    `);
    db.exec(`
      CREATE TRIGGER IF NOT EXISTS trg_memories_immutable
      BEFORE UPDATE OF id, user_id, text, type, slot, created_at, confidence ON memories
      BEGIN
        SELECT RAISE(ABORT, 'memory records are immutable apart from status');
      END
    `);

    // ── Supersession edges ───────────────────────────────────
    db.exec(`
      CREATE TABLE IF NOT EXISTS memory_supersessions (
        new_id TEXT NOT NULL REFERENCES memories(id),
        old_id TEXT NOT NULL REFERENCES memories(id),
        PRIMARY KEY (new_id, old_id)
      )
    `);
    db.exec('CREATE INDEX IF NOT EXISTS idx_supersessions_old ON memory_supersessions(old_id)');
    db.exec(`
      CREATE TRIGGER IF NOT EXISTS trg_supersessions_no_update
      BEFORE UPDATE ON memory_supersessions
      BEGIN
        SELECT RAISE(ABORT, 'supersession edges are append-only');
      END
    `);
    db.exec(`
      CREATE TRIGGER IF NOT EXISTS trg_supersessions_no_delete
      BEFORE DELETE ON memory_supersessions
      BEGIN
        SELECT RAISE(ABORT, 'supersession edges are append-only');
      END
    `);
  },
};
