import type { Logger } from 'pino';
import {
  CATEGORY_TO_TYPE,
  MetadataTransactionError,
  ValidationError,
  WriteConflictExhaustedError,
  addDays,
  errorCode,
  errorMessage,
  factCandidateSchema,
  generateId,
  type BatchWriteResult,
  type DecayConfig,
  type Embedder,
  type FactCandidate,
  type IndexingLag,
  type MemoryRecord,
  type MetadataStore,
  type SlotLock,
  type VectorIndex,
  type VectorPayload,
} from '@tempora/shared';
import { resolveConflicts } from './conflict-resolver.js';
import { silentLogger } from '../logger.js';

export interface WriteCoordinatorOptions {
  metadata: MetadataStore;
  vectorIndex: VectorIndex;
  embedder: Embedder;
  slotLock: SlotLock;
  decay: DecayConfig;
  /** Extra commit attempts after the first when a transaction conflicts. */
  writeRetries: number;
  logger?: Logger;
  clock?: () => Date;
  /** Called once per record that committed but could not be indexed. */
  onIndexingLag?: (lag: IndexingLag) => void;
}

export function toVectorPayload(record: MemoryRecord): VectorPayload {
  return {
    user_id: record.userId,
    type: record.type,
    slot: record.slot,
    status: record.status,
    created_at: record.createdAt,
  };
}

/**
 * Turns fact candidates into committed memory records. Each candidate is
 * resolved and committed on its own under its slot lock, then embedded and
 * indexed once the lock is released. The metadata store is always written
 * before the vector index.
 */
export class WriteCoordinator {
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(private readonly options: WriteCoordinatorOptions) {
    this.logger = options.logger ?? silentLogger();
    this.clock = options.clock ?? (() => new Date());
  }

  async writeBatch(
    candidates: readonly FactCandidate[],
    userId: string,
    sourceTurnId: string | null = null,
  ): Promise<BatchWriteResult> {
    const result: BatchWriteResult = { records: [], failures: [], indexingLag: [] };

    for (const candidate of candidates) {
      let record: MemoryRecord;
      try {
        const valid = validateCandidate(candidate);
        record = await this.commitCandidate(this.buildDraft(valid, userId, sourceTurnId));
      } catch (err) {
        this.logger.error({ err, userId, slot: candidate.slot }, 'memory write failed');
        result.failures.push({
          candidate,
          code: errorCode(err, 'metadata_transaction_error'),
          message: errorMessage(err),
        });
        continue;
      }

      result.records.push(record);
      result.indexingLag.push(...(await this.project(record)));
    }

    return result;
  }

  /** Embed and upsert one committed record. Returns a lag entry instead of throwing. */
  async index(record: MemoryRecord): Promise<IndexingLag | null> {
    try {
      const vector = await this.options.embedder.embed(record.text);
      await this.options.vectorIndex.upsert(record.id, vector, toVectorPayload(record));
    } catch (err) {
      return this.lag(record.id, err);
    }
    return this.dropIfInactive(record.id);
  }

  /**
   * Upserts run outside the slot lock, so a newer write may have archived the
   * record (and already removed its vector) while it was being embedded.
   * Checked after every upsert so the index ends up holding active records only.
   */
  async dropIfInactive(memoryId: string): Promise<IndexingLag | null> {
    let current: MemoryRecord | null;
    try {
      current = await this.options.metadata.getById(memoryId);
    } catch (err) {
      return this.lag(memoryId, err);
    }
    if (current?.status === 'active') return null;
    this.logger.debug({ memoryId, status: current?.status ?? null }, 'record left active while indexing');
    return this.unindex(memoryId);
  }

  /** Remove a record that is no longer active from the vector index. */
  async unindex(memoryId: string): Promise<IndexingLag | null> {
    try {
      await this.options.vectorIndex.delete(memoryId);
      return null;
    } catch (err) {
      return this.lag(memoryId, err);
    }
  }

  private buildDraft(candidate: FactCandidate, userId: string, sourceTurnId: string | null): MemoryRecord {
    const type = CATEGORY_TO_TYPE[candidate.category];
    const createdAt = this.clock().toISOString();
    const validityDays = this.options.decay.validityDays[type];

    return {
      id: generateId(),
      userId,
      text: candidate.text,
      type,
      slot: candidate.slot,
      status: 'active',
      createdAt,
      validUntil: validityDays === null ? null : addDays(createdAt, validityDays),
      decayHalfLifeDays: this.options.decay.halfLifeDays[type],
      confidence: candidate.confidence,
      supersedes: [],
      sourceTurnId,
      extra: { category: candidate.category },
      version: 1,
    };
  }

  private commitCandidate(draft: MemoryRecord): Promise<MemoryRecord> {
    const { slot } = draft;
    if (slot === null) return this.commitWithRetry(draft);
    return this.options.slotLock.runExclusive(draft.userId, slot, () => this.commitWithRetry(draft));
  }

  private async commitWithRetry(draft: MemoryRecord): Promise<MemoryRecord> {
    const { metadata, writeRetries } = this.options;
    const attempts = writeRetries + 1;
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        const active = draft.slot === null ? [] : await metadata.getActiveBySlot(draft.userId, draft.slot);
        const plan = resolveConflicts(draft, active);
        const committed = await metadata.commit(plan, new Map(active.map((r) => [r.id, r.version])));
        this.logger.debug(
          { memoryId: committed.id, userId: committed.userId, slot: committed.slot, archived: plan.archive.length },
          'memory committed',
        );
        return committed;
      } catch (err) {
        if (!(err instanceof MetadataTransactionError) || !err.retryable) throw err;
        lastError = err;
        this.logger.warn(
          { userId: draft.userId, slot: draft.slot, attempt, code: err.code },
          'memory commit conflicted, retrying',
        );
      }
    }

    throw new WriteConflictExhaustedError(draft.userId, draft.slot, attempts, { cause: lastError });
  }

  /** Bring the vector index in line with a fresh commit: new record in, archived records out. */
  private async project(record: MemoryRecord): Promise<IndexingLag[]> {
    const lags: IndexingLag[] = [];
    const added = await this.index(record);
    if (added) lags.push(added);
    for (const archivedId of record.supersedes) {
      const removed = await this.unindex(archivedId);
      if (removed) lags.push(removed);
    }
    return lags;
  }

  private lag(memoryId: string, err: unknown): IndexingLag {
    const lag: IndexingLag = {
      memoryId,
      code: errorCode(err, 'vector_index_error'),
      message: errorMessage(err),
    };
    this.logger.warn({ memoryId, code: lag.code }, 'vector index lagging behind metadata');
    this.options.onIndexingLag?.(lag);
    return lag;
  }
}

function validateCandidate(candidate: FactCandidate): FactCandidate {
  const parsed = factCandidateSchema.safeParse(candidate);
  if (parsed.success) return parsed.data;
  const detail = parsed.error.issues.map((i) => `${i.path.join('.') || 'candidate'}: ${i.message}`).join('; ');
  throw new ValidationError(detail);
}
