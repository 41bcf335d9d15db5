import type { Logger } from 'pino';
import {
  RecordNotFoundError,
  ValidationError,
  errorCode,
  errorMessage,
  type BatchWriteResult,
  type ConversationMessage,
  type DecayConfig,
  type Embedder,
  type FactCandidate,
  type FactExtractor,
  type IndexingLag,
  type MemoryRecord,
  type MemoryStatus,
  type MetadataStore,
  type ReindexResult,
  type SearchResult,
  type SlotLock,
  type TemporaConfig,
  type VectorIndex,
} from '@tempora/shared';
import { initializeStore } from '@tempora/store';
import { createEmbedder, createFactExtractor } from '@tempora/models';
import { WriteCoordinator, toVectorPayload } from './memory/write-coordinator.js';
import { ReadCoordinator, type SearchFilters } from './memory/read-coordinator.js';
import { silentLogger } from './logger.js';

export interface TemporalMemoryOptions {
  metadata: MetadataStore;
  vectorIndex: VectorIndex;
  slotLock: SlotLock;
  embedder: Embedder;
  extractor?: FactExtractor;
  decay: DecayConfig;
  writeRetries: number;
  /** Candidates below this confidence are dropped by `add`. */
  minConfidence?: number;
  logger?: Logger;
  clock?: () => Date;
  onIndexingLag?: (lag: IndexingLag) => void;
  /** Releases whatever the engine was built on. */
  close?: () => void;
}

export interface SearchOptions extends SearchFilters {
  limit?: number;
}

export interface DeleteResult {
  deleted: MemoryRecord;
  indexingLag: IndexingLag | null;
}

export const DEFAULT_SEARCH_LIMIT = 10;

/**
 * Entry point for callers: ingest conversations, write facts directly,
 * search, list, delete and repair the index.
 */
export class TemporalMemory {
  readonly writer: WriteCoordinator;
  readonly reader: ReadCoordinator;
  private readonly logger: Logger;

  constructor(private readonly options: TemporalMemoryOptions) {
    this.logger = options.logger ?? silentLogger();
    this.writer = new WriteCoordinator({
      metadata: options.metadata,
      vectorIndex: options.vectorIndex,
      embedder: options.embedder,
      slotLock: options.slotLock,
      decay: options.decay,
      writeRetries: options.writeRetries,
      logger: this.logger.child({ component: 'write' }),
      clock: options.clock,
      onIndexingLag: options.onIndexingLag,
    });
    this.reader = new ReadCoordinator({
      metadata: options.metadata,
      vectorIndex: options.vectorIndex,
      embedder: options.embedder,
      logger: this.logger.child({ component: 'read' }),
      clock: options.clock,
    });
  }

  /** Wire stores and providers from a loaded configuration. */
  static fromConfig(config: TemporaConfig, options: { logger?: Logger } = {}): TemporalMemory {
    const store = initializeStore(config);
    try {
      return new TemporalMemory({
        metadata: store.metadata,
        vectorIndex: store.vectorIndex,
        slotLock: store.slotLock,
        embedder: createEmbedder(config.embedding, config.vector.dimension),
        extractor: createFactExtractor(config.extraction),
        decay: config.decay,
        writeRetries: config.store.writeRetries,
        minConfidence: config.extraction.minConfidence,
        logger: options.logger,
        close: () => store.close(),
      });
    } catch (err) {
      store.close();
      throw err;
    }
  }

  /** Extract facts from a conversation and write them. */
  async add(
    messages: ConversationMessage[],
    userId: string,
    sourceTurnId: string | null = null,
  ): Promise<BatchWriteResult> {
    const { extractor } = this.options;
    if (!extractor) throw new ValidationError('no fact extractor configured');

    let candidates: FactCandidate[];
    try {
      candidates = await extractor.extract(messages);
    } catch (err) {
      this.logger.error({ err, userId }, 'fact extraction failed');
      return {
        records: [],
        failures: [{ candidate: null, code: errorCode(err, 'extraction_error'), message: errorMessage(err) }],
        indexingLag: [],
      };
    }

    const minConfidence = this.options.minConfidence ?? 0;
    const kept = candidates.filter((c) => c.confidence >= minConfidence);
    this.logger.debug({ userId, extracted: candidates.length, kept: kept.length }, 'facts extracted');
    return this.writer.writeBatch(kept, userId, sourceTurnId);
  }

  /** Write already-extracted candidates. */
  writeFacts(
    candidates: readonly FactCandidate[],
    userId: string,
    sourceTurnId: string | null = null,
  ): Promise<BatchWriteResult> {
    return this.writer.writeBatch(candidates, userId, sourceTurnId);
  }

  search(userId: string, query: string, options: SearchOptions = {}): Promise<SearchResult> {
    const { limit = DEFAULT_SEARCH_LIMIT, ...filters } = options;
    return this.reader.search(userId, query, limit, filters);
  }

  list(userId: string, status: MemoryStatus = 'active'): Promise<MemoryRecord[]> {
    return this.reader.list(userId, status);
  }

  /** A record of `userId`; another user's record looks missing. */
  async get(userId: string, memoryId: string): Promise<MemoryRecord> {
    const record = await this.options.metadata.getById(memoryId);
    if (!record || record.userId !== userId) throw new RecordNotFoundError(memoryId);
    return record;
  }

  /** Mark an active record deleted and drop its vector. */
  async delete(userId: string, memoryId: string): Promise<DeleteResult> {
    const record = await this.get(userId, memoryId);
    if (record.status !== 'active') {
      throw new ValidationError(`memory ${memoryId} is ${record.status} and cannot be deleted`);
    }

    const deleted = await this.options.metadata.updateStatus(memoryId, 'deleted', record.version);
    const indexingLag = await this.writer.unindex(memoryId);
    this.logger.info({ memoryId, userId }, 'memory deleted');
    return { deleted, indexingLag };
  }

  /**
   * Bring the vector index back in line for the given records: active ones
   * are re-embedded and upserted, the rest are removed.
   */
  async reindex(memoryIds: readonly string[]): Promise<ReindexResult> {
    const result: ReindexResult = { indexed: [], failed: [] };
    const records = await this.options.metadata.listByIds(memoryIds);
    const found = new Set(records.map((r) => r.id));

    for (const id of new Set(memoryIds)) {
      if (!found.has(id)) {
        const missing = new RecordNotFoundError(id);
        result.failed.push({ memoryId: id, code: missing.code, message: missing.message });
      }
    }

    for (const record of records.filter((r) => r.status !== 'active')) {
      const lag = await this.writer.unindex(record.id);
      if (lag) result.failed.push(lag);
      else result.indexed.push(record.id);
    }

    const active = records.filter((r) => r.status === 'active');
    if (active.length === 0) return result;

    let vectors: number[][];
    try {
      vectors = await this.options.embedder.embedMany(active.map((r) => r.text));
    } catch (err) {
      for (const record of active) {
        result.failed.push({ memoryId: record.id, code: errorCode(err, 'embedding_error'), message: errorMessage(err) });
      }
      return result;
    }

    for (const [i, record] of active.entries()) {
      try {
        await this.options.vectorIndex.upsert(record.id, vectors[i], toVectorPayload(record));
      } catch (err) {
        result.failed.push({ memoryId: record.id, code: errorCode(err, 'vector_index_error'), message: errorMessage(err) });
        continue;
      }
      const lag = await this.writer.dropIfInactive(record.id);
      if (lag) result.failed.push(lag);
      else result.indexed.push(record.id);
    }

    this.logger.info({ indexed: result.indexed.length, failed: result.failed.length }, 'reindex finished');
    return result;
  }

  /** A record followed by everything it transitively superseded, newest first. */
  async history(userId: string, memoryId: string): Promise<MemoryRecord[]> {
    const root = await this.get(userId, memoryId);
    const seen = new Map<string, MemoryRecord>([[root.id, root]]);
    let frontier = [...root.supersedes];

    while (frontier.length > 0) {
      const batch = (await this.options.metadata.listByIds(frontier)).filter((r) => !seen.has(r.id));
      for (const record of batch) seen.set(record.id, record);
      frontier = batch.flatMap((r) => r.supersedes).filter((id) => !seen.has(id));
    }

    return [...seen.values()].sort(
      (a, b) => Date.parse(b.createdAt) - Date.parse(a.createdAt) || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0),
    );
  }

  close(): void {
    this.options.close?.();
  }
}
