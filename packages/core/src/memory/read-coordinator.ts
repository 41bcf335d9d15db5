import type { Logger } from 'pino';
import type {
  DegradedReason,
  Embedder,
  MemoryRecord,
  MemorySearchFilters,
  MemoryStatus,
  MetadataStore,
  SearchResult,
  VectorIndex,
  VectorMatch,
} from '@tempora/shared';
import { rank, rankScored } from './decay-ranker.js';
import { silentLogger } from '../logger.js';

export interface ReadCoordinatorOptions {
  metadata: MetadataStore;
  vectorIndex: VectorIndex;
  embedder: Embedder;
  logger?: Logger;
  clock?: () => Date;
}

export type SearchFilters = Pick<MemorySearchFilters, 'type' | 'slot'>;

/**
 * Query side of the engine. Similarity comes from the vector index, records
 * always come from the metadata store, and ordering always goes through the
 * decay ranker.
 */
export class ReadCoordinator {
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(private readonly options: ReadCoordinatorOptions) {
    this.logger = options.logger ?? silentLogger();
    this.clock = options.clock ?? (() => new Date());
  }

  async search(userId: string, query: string, limit: number, filters: SearchFilters = {}): Promise<SearchResult> {
    let vector: number[];
    try {
      vector = await this.options.embedder.embed(query);
    } catch (err) {
      return this.degraded(userId, limit, filters, 'embedding', err);
    }

    let matches: VectorMatch[];
    try {
      matches = await this.options.vectorIndex.search(userId, vector, limit, filters);
    } catch (err) {
      return this.degraded(userId, limit, filters, 'vector-index', err);
    }

    const similarity = new Map(matches.map((m) => [m.id, m.score]));
    // Ids the metadata store no longer knows are dropped here.
    const records = (await this.options.metadata.listByIds([...similarity.keys()]))
      .filter((r) => r.userId === userId);

    return {
      results: rankScored(records, { similarity, now: this.clock() }).slice(0, limit),
      degraded: false,
    };
  }

  async list(userId: string, status: MemoryStatus = 'active'): Promise<MemoryRecord[]> {
    const records = await this.options.metadata.listByUser(userId, status);
    return rank(records, { status, now: this.clock() });
  }

  /** Similarity-free approximation over all active records of the user. */
  private async degraded(
    userId: string,
    limit: number,
    filters: SearchFilters,
    reason: DegradedReason,
    err: unknown,
  ): Promise<SearchResult> {
    this.logger.warn({ err, userId, reason }, 'search degraded to metadata-only ranking');

    const records = (await this.options.metadata.listByUser(userId, 'active')).filter(
      (r) => (!filters.type || r.type === filters.type) && (!filters.slot || r.slot === filters.slot),
    );
    return {
      results: rankScored(records, { now: this.clock() }).slice(0, limit),
      degraded: true,
      reason,
    };
  }
}
