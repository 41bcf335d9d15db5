import Database from 'better-sqlite3';
import {
  VectorIndexError,
  type MemorySearchFilters,
  type VectorIndex,
  type VectorMatch,
  type VectorPayload,
} from '@tempora/shared';
import { decodeVector, encodeVector, similarity, type DistanceMetric } from './similarity.js';

interface VectorRow {
  id: string;
  vector: Buffer;
}

interface UpsertParams {
  id: string;
  user_id: string;
  type: string;
  slot: string | null;
  status: string;
  created_at: string;
  dimension: number;
  vector: Buffer;
}

export interface SqliteVectorIndexOptions {
  dimension: number;
  distance: DistanceMetric;
}

/**
 * Brute-force similarity index in its own SQLite file. Candidate rows are
 * narrowed by user and payload filters in SQL, then scored in process.
 */
export class SqliteVectorIndex implements VectorIndex {
  private upsertStmt: Database.Statement<[UpsertParams]>;
  private deleteStmt: Database.Statement<[string]>;

  constructor(private readonly db: Database.Database, private readonly options: SqliteVectorIndexOptions) {
    this.upsertStmt = db.prepare<UpsertParams>(`
      INSERT INTO memory_vectors (id, user_id, type, slot, status, created_at, dimension, vector)
      VALUES (@id, @user_id, @type, @slot, @status, @created_at, @dimension, @vector)
      ON CONFLICT (id) DO UPDATE SET
        user_id = excluded.user_id, type = excluded.type, slot = excluded.slot,
        status = excluded.status, created_at = excluded.created_at,
        dimension = excluded.dimension, vector = excluded.vector
    `);
    this.deleteStmt = db.prepare<[string]>('DELETE FROM memory_vectors WHERE id = ?');
  }

  async upsert(id: string, vector: number[], payload: VectorPayload): Promise<void> {
    this.checkDimension(vector);
    this.guard(() =>
      this.upsertStmt.run({
        id,
        user_id: payload.user_id,
        type: payload.type,
        slot: payload.slot,
        status: payload.status,
        created_at: payload.created_at,
        dimension: vector.length,
        vector: encodeVector(vector),
      }),
    );
  }

  async delete(id: string): Promise<void> {
    this.guard(() => this.deleteStmt.run(id));
  }

  async search(
    userId: string,
    queryVector: number[],
    limit: number,
    filters?: MemorySearchFilters,
  ): Promise<VectorMatch[]> {
    this.checkDimension(queryVector);

    const conditions = ['user_id = ?'];
    const params: string[] = [userId];
    if (filters?.type) {
      conditions.push('type = ?');
      params.push(filters.type);
    }
    if (filters?.slot) {
      conditions.push('slot = ?');
      params.push(filters.slot);
    }
    if (filters?.status) {
      conditions.push('status = ?');
      params.push(filters.status);
    }

    const rows = this.guard(() =>
      this.db
        .prepare<string[], VectorRow>(`SELECT id, vector FROM memory_vectors WHERE ${conditions.join(' AND ')}`)
        .all(...params),
    );

    return rows
      .map((row) => ({ id: row.id, score: similarity(this.options.distance, queryVector, decodeVector(row.vector)) }))
      .sort((a, b) => b.score - a.score || a.id.localeCompare(b.id))
      .slice(0, limit);
  }

  private checkDimension(vector: number[]): void {
    if (vector.length !== this.options.dimension) {
      throw new VectorIndexError(
        `vector has ${vector.length} dimensions, index expects ${this.options.dimension}`,
      );
    }
  }

  private guard<T>(fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof Database.SqliteError) {
        throw new VectorIndexError(`${err.code}: ${err.message}`, { cause: err });
      }
      throw err;
    }
  }
}
