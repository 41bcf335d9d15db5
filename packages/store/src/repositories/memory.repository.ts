import type Database from 'better-sqlite3';
import { z } from 'zod';
import {
  memoryTypeSchema,
  memoryStatusSchema,
  OptimisticConflictError,
  type MemoryRecord,
  type MemoryStatus,
} from '@tempora/shared';

// ── Rows ─────────────────────────────────────────────────────────

export interface MemoryRow {
  id: string;
  user_id: string;
  text: string;
  type: string;
  slot: string | null;
  status: string;
  created_at: string;
  valid_until: string | null;
  decay_half_life_days: number | null;
  confidence: number;
  source_turn_id: string | null;
  extra: string;        // JSON object
  version: number;
  supersedes: string;   // JSON array, aggregated from memory_supersessions
}

interface InsertParams {
  id: string;
  user_id: string;
  text: string;
  type: string;
  slot: string | null;
  status: string;
  created_at: string;
  valid_until: string | null;
  decay_half_life_days: number | null;
  confidence: number;
  source_turn_id: string | null;
  extra: string;
  version: number;
}

const SELECT_MEMORY = `
  SELECT m.*,
    (SELECT json_group_array(s.old_id) FROM memory_supersessions s WHERE s.new_id = m.id) AS supersedes
  FROM memories m
`;

const extraSchema = z.record(z.unknown());
const supersedesSchema = z.array(z.string());

// ── Repository ───────────────────────────────────────────────────

/**
 * Synchronous access to the memories table and its supersession edges.
 * Callers that need the async contract go through SqliteMetadataStore.
 */
export class MemoryRepository {
  private insertStmt: Database.Statement<[InsertParams]>;
  private insertEdgeStmt: Database.Statement<[string, string]>;
  private getStmt: Database.Statement<[string], MemoryRow>;
  private activeBySlotStmt: Database.Statement<[string, string], MemoryRow>;
  private listByUserStmt: Database.Statement<[string], MemoryRow>;
  private listByUserStatusStmt: Database.Statement<[string, string], MemoryRow>;
  private updateStatusStmt: Database.Statement<[string, string, number]>;
  private countStmt: Database.Statement<[string], { status: string; n: number }>;

  constructor(private db: Database.Database) {
    this.insertStmt = db.prepare<InsertParams>(`
      INSERT INTO memories
        (id, user_id, text, type, slot, status, created_at, valid_until,
         decay_half_life_days, confidence, source_turn_id, extra, version)
      VALUES
        (@id, @user_id, @text, @type, @slot, @status, @created_at, @valid_until,
         @decay_half_life_days, @confidence, @source_turn_id, @extra, @version)
    `);
    this.insertEdgeStmt = db.prepare<[string, string]>('INSERT INTO memory_supersessions (new_id, old_id) VALUES (?, ?)');
    this.getStmt = db.prepare<[string], MemoryRow>(`${SELECT_MEMORY} WHERE m.id = ?`);
    this.activeBySlotStmt = db.prepare<[string, string], MemoryRow>(
      `${SELECT_MEMORY} WHERE m.user_id = ? AND m.slot = ? AND m.status = 'active' ORDER BY m.created_at`,
    );
    this.listByUserStmt = db.prepare<[string], MemoryRow>(`${SELECT_MEMORY} WHERE m.user_id = ? ORDER BY m.created_at DESC`);
    this.listByUserStatusStmt = db.prepare<[string, string], MemoryRow>(
      `${SELECT_MEMORY} WHERE m.user_id = ? AND m.status = ? ORDER BY m.created_at DESC`,
    );
    this.updateStatusStmt = db.prepare<[string, string, number]>(`
      UPDATE memories SET status = ?, version = version + 1
      WHERE id = ? AND version = ? AND status = 'active'
    `);
    this.countStmt = db.prepare<[string], { status: string; n: number }>('SELECT status, COUNT(*) AS n FROM memories WHERE user_id = ? GROUP BY status');
  }

  /** Insert a record and its supersession edges in one transaction. */
  insert(record: MemoryRecord): void {
    this.db.transaction(() => this.insertRow(record))();
  }

  get(id: string): MemoryRecord | null {
    const row = this.getStmt.get(id);
    return row ? parseMemoryRow(row) : null;
  }

  getActiveBySlot(userId: string, slot: string): MemoryRecord[] {
    return this.activeBySlotStmt.all(userId, slot).map(parseMemoryRow);
  }

  listByUser(userId: string, status?: MemoryStatus): MemoryRecord[] {
    const rows = status
      ? this.listByUserStatusStmt.all(userId, status)
      : this.listByUserStmt.all(userId);
    return rows.map(parseMemoryRow);
  }

  listByIds(ids: readonly string[]): MemoryRecord[] {
    if (ids.length === 0) return [];
    const unique = [...new Set(ids)];
    const placeholders = unique.map(() => '?').join(', ');
    const rows = this.db
      .prepare<string[], MemoryRow>(`${SELECT_MEMORY} WHERE m.id IN (${placeholders})`)
      .all(...unique);
    return rows.map(parseMemoryRow);
  }

  /**
   * Move an active record to `status` if its version still matches.
   * Returns false when the row changed since it was read (or is not active).
   */
  transition(id: string, status: MemoryStatus, expectedVersion: number): boolean {
    return this.updateStatusStmt.run(status, id, expectedVersion).changes === 1;
  }

  /**
   * Archive `archive` (each guarded by its expected version) and insert
   * `record`, atomically. Throws OptimisticConflictError, writing nothing, when any
   * archive target changed since it was read.
   */
  archiveAndInsert(
    record: MemoryRecord,
    archive: readonly string[],
    expectedVersions: ReadonlyMap<string, number>,
  ): void {
    this.db.transaction(() => {
      for (const id of archive) {
        const version = expectedVersions.get(id);
        if (version === undefined || !this.transition(id, 'archived', version)) {
          throw new OptimisticConflictError(id);
        }
      }
      this.insertRow(record);
    }).immediate();
  }

  countByStatus(userId: string): Record<MemoryStatus, number> {
    const counts: Record<MemoryStatus, number> = { active: 0, archived: 0, deleted: 0 };
    for (const row of this.countStmt.all(userId)) {
      counts[memoryStatusSchema.parse(row.status)] = row.n;
    }
    return counts;
  }

  private insertRow(record: MemoryRecord): void {
    this.insertStmt.run({
      id: record.id,
      user_id: record.userId,
      text: record.text,
      type: record.type,
      slot: record.slot,
      status: record.status,
      created_at: record.createdAt,
      valid_until: record.validUntil,
      decay_half_life_days: record.decayHalfLifeDays,
      confidence: record.confidence,
      source_turn_id: record.sourceTurnId,
      extra: JSON.stringify(record.extra),
      version: record.version,
    });
    for (const oldId of record.supersedes) {
      this.insertEdgeStmt.run(record.id, oldId);
    }
  }
}

export function parseMemoryRow(row: MemoryRow): MemoryRecord {
  return {
    id: row.id,
    userId: row.user_id,
    text: row.text,
    type: memoryTypeSchema.parse(row.type),
    slot: row.slot,
    status: memoryStatusSchema.parse(row.status),
    createdAt: row.created_at,
    validUntil: row.valid_until,
    decayHalfLifeDays: row.decay_half_life_days,
    confidence: row.confidence,
    supersedes: supersedesSchema.parse(JSON.parse(row.supersedes)).sort(),
    sourceTurnId: row.source_turn_id,
    extra: extraSchema.parse(JSON.parse(row.extra)),
    version: row.version,
  };
}
