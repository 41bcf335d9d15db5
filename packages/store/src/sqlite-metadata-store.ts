import Database from 'better-sqlite3';
import {
  MetadataTransactionError,
  OptimisticConflictError,
  TemporaError,
  ValidationError,
  type MemoryRecord,
  type MemoryStatus,
  type MetadataStore,
  type ResolutionPlan,
} from '@tempora/shared';
import { MemoryRepository } from './repositories/memory.repository.js';

// A second active record in a slot, or a writer holding the database.
const RETRYABLE_SQLITE_CODES = new Set(['SQLITE_CONSTRAINT_UNIQUE', 'SQLITE_BUSY']);

/**
 * MetadataStore backed by the SQLite memories table.
 * better-sqlite3 is synchronous, so every call completes before the returned
 * promise resolves and each commit runs as one IMMEDIATE transaction.
 */
export class SqliteMetadataStore implements MetadataStore {
  constructor(private readonly repo: MemoryRepository) {}

  static fromDatabase(db: Database.Database): SqliteMetadataStore {
    return new SqliteMetadataStore(new MemoryRepository(db));
  }

  async insert(record: MemoryRecord): Promise<void> {
    this.guard(() => this.repo.insert(record));
  }

  async getById(id: string): Promise<MemoryRecord | null> {
    return this.guard(() => this.repo.get(id));
  }

  async updateStatus(id: string, newStatus: MemoryStatus, expectedVersion: number): Promise<MemoryRecord> {
    if (newStatus === 'active') {
      throw new ValidationError('a memory cannot transition back to active');
    }
    return this.guard(() => {
      if (!this.repo.transition(id, newStatus, expectedVersion)) {
        throw new OptimisticConflictError(id);
      }
      const updated = this.repo.get(id);
      if (!updated) throw new OptimisticConflictError(id);
      return updated;
    });
  }

  async getActiveBySlot(userId: string, slot: string): Promise<MemoryRecord[]> {
    return this.guard(() => this.repo.getActiveBySlot(userId, slot));
  }

  async listByUser(userId: string, status?: MemoryStatus): Promise<MemoryRecord[]> {
    return this.guard(() => this.repo.listByUser(userId, status));
  }

  async listByIds(ids: readonly string[]): Promise<MemoryRecord[]> {
    return this.guard(() => this.repo.listByIds(ids));
  }

  async commit(plan: ResolutionPlan, expectedVersions: ReadonlyMap<string, number>): Promise<MemoryRecord> {
    return this.guard(() => {
      this.repo.archiveAndInsert(plan.insert, plan.archive, expectedVersions);
      return plan.insert;
    });
  }

  private guard<T>(fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof TemporaError) throw err;
      if (err instanceof Database.SqliteError) {
        throw new MetadataTransactionError(`${err.code}: ${err.message}`, {
          cause: err,
          retryable: RETRYABLE_SQLITE_CODES.has(err.code),
        });
      }
      throw err;
    }
  }
}
