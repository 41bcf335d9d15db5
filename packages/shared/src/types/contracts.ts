import type {
  ConversationMessage,
  FactCandidate,
  MemoryRecord,
  MemorySearchFilters,
  MemoryStatus,
  MemoryType,
  ResolutionPlan,
} from './memory.js';

/**
 * Source of truth for memory records. Implementations must be safe to share
 * across concurrent operations.
 */
export interface MetadataStore {
  insert(record: MemoryRecord): Promise<void>;
  getById(id: string): Promise<MemoryRecord | null>;
  /**
   * Optimistic status transition. Rejects with `OptimisticConflictError` when
   * the stored version differs from `expectedVersion` or the transition does
   * not move the status forward.
   */
  updateStatus(id: string, newStatus: MemoryStatus, expectedVersion: number): Promise<MemoryRecord>;
  getActiveBySlot(userId: string, slot: string): Promise<MemoryRecord[]>;
  listByUser(userId: string, status?: MemoryStatus): Promise<MemoryRecord[]>;
  /** Missing ids are omitted from the result. */
  listByIds(ids: readonly string[]): Promise<MemoryRecord[]>;
  /**
   * Archive every id in `plan.archive` (each checked against
   * `expectedVersions`) and insert `plan.insert` with its supersession edges,
   * all in one transaction.
   */
  commit(plan: ResolutionPlan, expectedVersions: ReadonlyMap<string, number>): Promise<MemoryRecord>;
}

/** Mutual exclusion scoped to one (userId, slot) pair. */
export interface SlotLock {
  runExclusive<T>(userId: string, slot: string, fn: () => Promise<T>): Promise<T>;
}

export type VectorPayload = {
  user_id: string;
  type: MemoryType;
  slot: string | null;
  status: MemoryStatus;
  created_at: string;
};

export interface VectorMatch {
  id: string;
  score: number;
}

/** Derived, eventually consistent similarity index keyed by memory id. */
export interface VectorIndex {
  upsert(id: string, vector: number[], payload: VectorPayload): Promise<void>;
  delete(id: string): Promise<void>;
  search(
    userId: string,
    queryVector: number[],
    limit: number,
    filters?: MemorySearchFilters,
  ): Promise<VectorMatch[]>;
}

export interface Embedder {
  readonly dimension: number;
  embed(text: string): Promise<number[]>;
  embedMany(texts: string[]): Promise<number[][]>;
}

export interface FactExtractor {
  extract(messages: ConversationMessage[]): Promise<FactCandidate[]>;
}
