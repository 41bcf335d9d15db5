import { QdrantClient } from '@qdrant/js-client-rest';
import {
  VectorIndexError,
  errorMessage,
  type MemorySearchFilters,
  type VectorIndex,
  type VectorMatch,
  type VectorPayload,
} from '@tempora/shared';
import type { DistanceMetric } from './similarity.js';

export interface QdrantVectorIndexOptions {
  url: string;
  apiKey?: string;
  collection: string;
  dimension: number;
  distance: DistanceMetric;
}

/**
 * Qdrant-backed index. Each memory is one point:
 * id = memory id, vector = embedding, payload = user_id/type/slot/status/created_at.
 * The collection is created on first use if it does not exist.
 */
export class QdrantVectorIndex implements VectorIndex {
  private client: QdrantClient;
  private ready: Promise<void> | null = null;

  constructor(private readonly options: QdrantVectorIndexOptions) {
    this.client = new QdrantClient({ url: options.url, apiKey: options.apiKey });
  }

  async upsert(id: string, vector: number[], payload: VectorPayload): Promise<void> {
    await this.call('upsert', async () => {
      await this.client.upsert(this.options.collection, {
        wait: true,
        points: [{ id, vector, payload: { ...payload } }],
      });
    });
  }

  async delete(id: string): Promise<void> {
    await this.call('delete', async () => {
      await this.client.delete(this.options.collection, { wait: true, points: [id] });
    });
  }

  async search(
    userId: string,
    queryVector: number[],
    limit: number,
    filters?: MemorySearchFilters,
  ): Promise<VectorMatch[]> {
    return this.call('search', async () => {
      const points = await this.client.search(this.options.collection, {
        vector: queryVector,
        limit,
        with_payload: false,
        filter: {
          must: [
            { key: 'user_id', match: { value: userId } },
            ...(filters?.type ? [{ key: 'type', match: { value: filters.type } }] : []),
            ...(filters?.slot ? [{ key: 'slot', match: { value: filters.slot } }] : []),
            ...(filters?.status ? [{ key: 'status', match: { value: filters.status } }] : []),
          ],
        },
      });
      return points.map((p) => ({ id: String(p.id), score: p.score }));
    });
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      await this.ensureCollection();
      return await fn();
    } catch (err) {
      if (err instanceof VectorIndexError) throw err;
      throw new VectorIndexError(`qdrant ${operation}: ${errorMessage(err)}`, { cause: err });
    }
  }

  private ensureCollection(): Promise<void> {
    if (!this.ready) {
      this.ready = this.createIfMissing().catch((err: unknown) => {
        this.ready = null;
        throw err;
      });
    }
    return this.ready;
  }

  private async createIfMissing(): Promise<void> {
    const { collections } = await this.client.getCollections();
    if (collections.some((c) => c.name === this.options.collection)) return;

    await this.client.createCollection(this.options.collection, {
      vectors: {
        size: this.options.dimension,
        distance: this.options.distance === 'cosine' ? 'Cosine' : 'Dot',
      },
    });
    await this.client.createPayloadIndex(this.options.collection, {
      field_name: 'user_id',
      field_schema: 'keyword',
    });
  }
}
