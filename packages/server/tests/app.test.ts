import { describe, it, expect, beforeEach, vi } from 'vitest';
import pino from 'pino';
import { TemporalMemory } from '@tempora/core';
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
  OptimisticConflictError,
  type Embedder,
  type FactCandidate,
  type FactExtractor,
} from '@tempora/shared';
import { createApp } from '../src/app.js';

/** One axis per topic so related texts land close together. */
const TOPICS = [/pizza|sushi|food/i, /lisbon|live/i];

const embedder: Embedder = {
  dimension: TOPICS.length,
  async embed(text) {
    return TOPICS.map((re) => (re.test(text) ? 1 : 0.05));
  },
  async embedMany(texts) {
    return Promise.all(texts.map((t) => this.embed(t)));
  },
};

const extractor: FactExtractor = {
  async extract(messages) {
    const facts: FactCandidate[] = [];
    for (const m of messages) {
      if (m.role === 'user' && /pizza/i.test(m.content)) {
        facts.push({ text: 'User likes pizza', category: 'preference', slot: 'favorite_food', confidence: 0.9 });
      }
    }
    return facts;
  },
};

let metadata: SqliteMetadataStore;

function createTestMemory(): TemporalMemory {
  // Each reading of the clock is one minute later, so records never share a timestamp.
  let tick = 0;
  const clock = () => new Date(Date.UTC(2024, 5, 1) + tick++ * 60_000);

  const db = createTestDatabase();
  runMigrations(db, allMigrations);
  const vectorDb = createTestDatabase();
  runMigrations(vectorDb, vectorMigrations);

  metadata = SqliteMetadataStore.fromDatabase(db);

  return new TemporalMemory({
    metadata,
    vectorIndex: new SqliteVectorIndex(vectorDb, { dimension: TOPICS.length, distance: 'cosine' }),
    slotLock: new SqliteSlotLock(db, { leaseMs: 5_000, waitMs: 1_000, pollMs: 1 }),
    embedder,
    extractor,
    decay: DEFAULT_CONFIG.decay,
    writeRetries: 3,
    logger: pino({ enabled: false }),
    clock,
  });
}

function postJson(body: unknown, headers: Record<string, string> = {}): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  };
}

const SUSHI = { text: 'User likes sushi', category: 'preference', slot: 'favorite_food', confidence: 0.8 };

let memory: TemporalMemory;
let app: ReturnType<typeof createApp>;

beforeEach(() => {
  memory = createTestMemory();
  app = createApp(memory, { vectorBackend: 'sqlite' });
});

describe('Server: memories', () => {
  it('POST /memories extracts and writes facts', async () => {
    const res = await app.request('/memories', postJson({
      userId: 'u1',
      messages: [{ role: 'user', content: 'I really love pizza' }],
      sourceTurnId: 'turn-1',
    }));

    expect(res.status).toBe(201);
    const [stored] = await memory.list('u1');
    expect(await res.json()).toEqual({
      records: [
        expect.objectContaining({
          id: stored.id,
          userId: 'u1',
          text: 'User likes pizza',
          type: 'preference',
          slot: 'favorite_food',
          status: 'active',
          createdAt: '2024-06-01T00:00:00.000Z',
          sourceTurnId: 'turn-1',
        }),
      ],
      failures: [],
      indexingLag: [],
    });
  });

  it('POST /memories/facts supersedes the previous slot holder', async () => {
    await app.request('/memories', postJson({ userId: 'u1', messages: [{ role: 'user', content: 'pizza!' }] }));
    const [pizza] = await memory.list('u1');

    const res = await app.request('/memories/facts', postJson({ userId: 'u1', candidates: [SUSHI] }));

    expect(res.status).toBe(201);
    expect(await res.json()).toMatchObject({
      records: [{ text: 'User likes sushi', supersedes: [pizza.id] }],
      failures: [],
    });

    const list = await app.request('/memories?userId=u1');
    expect(await list.json()).toMatchObject({ results: [{ text: 'User likes sushi' }] });

    const archived = await app.request('/memories?userId=u1&status=archived');
    expect(await archived.json()).toMatchObject({ results: [{ id: pizza.id, status: 'archived' }] });
  });

  it('rejects malformed bodies with 400', async () => {
    const res = await app.request('/memories/facts', postJson({ userId: 'u1', candidates: [] }));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'Invalid request',
      issues: [{ path: 'candidates', message: expect.any(String) }],
    });
  });

  it('rejects bodies that are not JSON', async () => {
    const res = await app.request('/memories', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{not json',
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'Validation failed: request body is not valid JSON',
      code: 'validation_error',
    });
  });

  it('GET /memories/search ranks matches', async () => {
    await app.request('/memories/facts', postJson({
      userId: 'u1',
      candidates: [SUSHI, { text: 'User lives in Lisbon', category: 'profile', slot: 'location', confidence: 1 }],
    }));

    const res = await app.request('/memories/search?userId=u1&q=food&limit=1');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      degraded: false,
      results: [
        {
          record: expect.objectContaining({ text: 'User likes sushi' }),
          score: expect.any(Number),
          similarity: expect.any(Number),
          decayFactor: expect.any(Number),
        },
      ],
    });
  });

  it('GET /memories/search validates the query string', async () => {
    const res = await app.request('/memories/search?userId=u1&q=food&limit=0');
    expect(res.status).toBe(400);
  });

  it('GET /memories/:id/history returns the supersession chain', async () => {
    await app.request('/memories/facts', postJson({ userId: 'u1', candidates: [{ ...SUSHI, text: 'User likes pizza' }] }));
    await app.request('/memories/facts', postJson({ userId: 'u1', candidates: [SUSHI] }));
    const [latest] = await memory.list('u1');

    const res = await app.request(`/memories/${latest.id}/history?userId=u1`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      results: [
        { text: 'User likes sushi', status: 'active' },
        { text: 'User likes pizza', status: 'archived' },
      ],
    });
  });

  it('DELETE /memories/:id marks the record deleted', async () => {
    await app.request('/memories/facts', postJson({ userId: 'u1', candidates: [SUSHI] }));
    const [rec] = await memory.list('u1');

    const res = await app.request(`/memories/${rec.id}?userId=u1`, { method: 'DELETE' });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      deleted: { id: rec.id, status: 'deleted', version: 2 },
      indexingLag: null,
    });

    const again = await app.request(`/memories/${rec.id}?userId=u1`, { method: 'DELETE' });
    expect(again.status).toBe(400);
  });

  it('DELETE /memories/:id returns 409 when a concurrent change wins', async () => {
    await app.request('/memories/facts', postJson({ userId: 'u1', candidates: [SUSHI] }));
    const [rec] = await memory.list('u1');
    vi.spyOn(metadata, 'updateStatus').mockRejectedValueOnce(new OptimisticConflictError(rec.id));

    const res = await app.request(`/memories/${rec.id}?userId=u1`, { method: 'DELETE' });
    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({
      error: `Optimistic conflict on memory ${rec.id}`,
      code: 'optimistic_conflict',
    });
  });

  it('DELETE /memories/:id returns 404 for an unknown record', async () => {
    const res = await app.request('/memories/ghost?userId=u1', { method: 'DELETE' });
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Memory not found: ghost', code: 'record_not_found' });
  });

  it('DELETE /memories/:id requires a userId', async () => {
    const res = await app.request('/memories/ghost', { method: 'DELETE' });
    expect(res.status).toBe(400);
  });

  it('GET /memories/:id returns a single record', async () => {
    await app.request('/memories/facts', postJson({ userId: 'u1', candidates: [SUSHI] }));
    const [rec] = await memory.list('u1');

    const res = await app.request(`/memories/${rec.id}?userId=u1`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ id: rec.id, text: 'User likes sushi' });
  });

  it('GET /memories/:id and its history are scoped to the user', async () => {
    await app.request('/memories/facts', postJson({ userId: 'u1', candidates: [SUSHI] }));
    const [rec] = await memory.list('u1');

    const other = await app.request(`/memories/${rec.id}?userId=u2`);
    expect(other.status).toBe(404);
    expect(await other.json()).toEqual({ error: `Memory not found: ${rec.id}`, code: 'record_not_found' });

    expect((await app.request(`/memories/${rec.id}/history?userId=u2`)).status).toBe(404);
    expect((await app.request(`/memories/${rec.id}`)).status).toBe(400);
    expect((await app.request(`/memories/${rec.id}/history`)).status).toBe(400);
  });

  it('POST /memories/reindex reports unknown ids', async () => {
    const res = await app.request('/memories/reindex', postJson({ ids: ['ghost'] }));
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      indexed: [],
      failed: [{ memoryId: 'ghost', code: 'record_not_found', message: 'Memory not found: ghost' }],
    });
  });
});

describe('Server: health', () => {
  it('GET /health reports status and backend', async () => {
    const res = await app.request('/health');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok', version: '0.1.0', vectorBackend: 'sqlite' });
  });
});

describe('Server: API key', () => {
  beforeEach(() => {
    app = createApp(memory, { vectorBackend: 'sqlite', apiKey: 'test-secret' });
  });

  it('rejects requests without a token', async () => {
    const res = await app.request('/memories?userId=u1');
    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ error: 'Authentication required' });
  });

  it('rejects a wrong token', async () => {
    const res = await app.request('/memories?userId=u1', { headers: { Authorization: 'Bearer nope' } });
    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ error: 'Invalid API key' });
  });

  it('accepts the configured token', async () => {
    const res = await app.request('/memories?userId=u1', { headers: { Authorization: 'Bearer test-secret' } });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ results: [] });
  });

  it('leaves /health open', async () => {
    expect((await app.request('/health')).status).toBe(200);
  });
});
