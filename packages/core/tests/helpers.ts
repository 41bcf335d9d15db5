import pino from 'pino';
import type Database from 'better-sqlite3';
import {
  createTestDatabase,
  runMigrations,
  allMigrations,
  vectorMigrations,
  SqliteMetadataStore,
  SqliteSlotLock,
  SqliteVectorIndex,
} from '@tempora/store';
import {
  DEFAULT_CONFIG,
  EmbeddingError,
  MS_PER_DAY,
  type Embedder,
  type FactCandidate,
  type MemoryRecord,
} from '@tempora/shared';

export const silent = pino({ enabled: false });

/** Topic axes: a text gets 1 on every axis it mentions, 0.05 elsewhere. */
const TOPICS = [/pizza|sushi|ramen|food/i, /lisbon|porto|live/i, /engineer|job|work/i, /cold|tired|sick/i];

export class KeywordEmbedder implements Embedder {
  readonly dimension = TOPICS.length;
  readonly seen: string[] = [];
  failing = false;

  async embed(text: string): Promise<number[]> {
    if (this.failing) throw new EmbeddingError('service unavailable');
    this.seen.push(text);
    return TOPICS.map((re) => (re.test(text) ? 1 : 0.05));
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    return Promise.all(texts.map((t) => this.embed(t)));
  }
}

export class FakeClock {
  constructor(public current = new Date('2024-06-01T00:00:00.000Z')) {}

  now = (): Date => this.current;

  advanceDays(days: number): void {
    this.current = new Date(this.current.getTime() + days * MS_PER_DAY);
  }
}

export function makeStores(): {
  db: Database.Database;
  metadata: SqliteMetadataStore;
  vectorIndex: SqliteVectorIndex;
  slotLock: SqliteSlotLock;
} {
  const db = createTestDatabase();
  runMigrations(db, allMigrations);
  const vectorDb = createTestDatabase();
  runMigrations(vectorDb, vectorMigrations);

  return {
    db,
    metadata: SqliteMetadataStore.fromDatabase(db),
    vectorIndex: new SqliteVectorIndex(vectorDb, { dimension: TOPICS.length, distance: 'cosine' }),
    slotLock: new SqliteSlotLock(db, { leaseMs: 5_000, waitMs: 2_000, pollMs: 1 }),
  };
}

export const decay = DEFAULT_CONFIG.decay;

export function candidate(overrides: Partial<FactCandidate> = {}): FactCandidate {
  return {
    text: 'User likes pizza',
    category: 'preference',
    slot: 'favorite_food',
    confidence: 0.9,
    ...overrides,
  };
}

export function record(overrides: Partial<MemoryRecord> = {}): MemoryRecord {
  return {
    id: 'mem-a',
    userId: 'u1',
    text: 'User likes pizza',
    type: 'preference',
    slot: 'favorite_food',
    status: 'active',
    createdAt: '2024-06-01T00:00:00.000Z',
    validUntil: null,
    decayHalfLifeDays: null,
    confidence: 1,
    supersedes: [],
    sourceTurnId: null,
    extra: {},
    version: 1,
    ...overrides,
  };
}
