import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  ExtractionError,
  RecordNotFoundError,
  ValidationError,
  type ConversationMessage,
  type FactCandidate,
  type FactExtractor,
} from '@tempora/shared';
import { TemporalMemory, type TemporalMemoryOptions } from '../src/temporal-memory.js';
import { FakeClock, KeywordEmbedder, candidate, decay, makeStores, silent } from './helpers.js';

class ScriptedExtractor implements FactExtractor {
  readonly calls: ConversationMessage[][] = [];

  constructor(private facts: FactCandidate[] | Error) {}

  async extract(messages: ConversationMessage[]): Promise<FactCandidate[]> {
    this.calls.push(messages);
    if (this.facts instanceof Error) throw this.facts;
    return this.facts;
  }
}

const MESSAGES: ConversationMessage[] = [
  { role: 'user', content: 'I moved to Lisbon and I love pizza now' },
  { role: 'assistant', content: 'Nice!' },
];

let stores: ReturnType<typeof makeStores>;
let embedder: KeywordEmbedder;
let clock: FakeClock;

function makeMemory(overrides: Partial<TemporalMemoryOptions> = {}): TemporalMemory {
  return new TemporalMemory({
    metadata: stores.metadata,
    vectorIndex: stores.vectorIndex,
    slotLock: stores.slotLock,
    embedder,
    decay,
    writeRetries: 3,
    logger: silent,
    clock: clock.now,
    ...overrides,
  });
}

beforeEach(() => {
  stores = makeStores();
  embedder = new KeywordEmbedder();
  clock = new FakeClock();
});

describe('TemporalMemory.add', () => {
  it('extracts facts and writes those above the confidence floor', async () => {
    const extractor = new ScriptedExtractor([
      candidate({ text: 'User lives in Lisbon', category: 'profile', slot: 'location', confidence: 0.95 }),
      candidate({ text: 'User might like pizza', confidence: 0.3 }),
    ]);
    const memory = makeMemory({ extractor, minConfidence: 0.5 });

    const result = await memory.add(MESSAGES, 'u1', 'turn-1');

    expect(extractor.calls).toEqual([MESSAGES]);
    expect(result.failures).toEqual([]);
    expect(result.records.map((r) => r.text)).toEqual(['User lives in Lisbon']);
    expect(result.records[0].sourceTurnId).toBe('turn-1');
  });

  it('reports an extraction failure without writing anything', async () => {
    const memory = makeMemory({ extractor: new ScriptedExtractor(new ExtractionError('model reply is not valid JSON')) });

    const result = await memory.add(MESSAGES, 'u1');

    expect(result).toEqual({
      records: [],
      failures: [
        { candidate: null, code: 'extraction_error', message: 'Fact extraction failed: model reply is not valid JSON' },
      ],
      indexingLag: [],
    });
    expect(await stores.metadata.listByUser('u1')).toEqual([]);
  });

  it('maps unexpected extractor errors to extraction_error', async () => {
    const memory = makeMemory({ extractor: new ScriptedExtractor(new Error('socket hang up')) });
    const result = await memory.add(MESSAGES, 'u1');
    expect(result.failures).toEqual([{ candidate: null, code: 'extraction_error', message: 'socket hang up' }]);
  });

  it('refuses to add without an extractor', async () => {
    await expect(makeMemory().add(MESSAGES, 'u1')).rejects.toThrow(
      'Validation failed: no fact extractor configured',
    );
  });
});

describe('TemporalMemory.search', () => {
  it('finds the current fact and not the superseded one', async () => {
    const memory = makeMemory();
    await memory.writeFacts([candidate({ text: 'User likes pizza' })], 'u1');
    clock.advanceDays(1);
    const [sushi] = (await memory.writeFacts([candidate({ text: 'User likes sushi' })], 'u1')).records;

    const result = await memory.search('u1', 'favourite food', { limit: 5 });

    expect(result.degraded).toBe(false);
    expect(result.results.map((s) => s.record.id)).toEqual([sushi.id]);
  });

  it('never returns another user\'s memories', async () => {
    const memory = makeMemory();
    await memory.writeFacts([candidate()], 'u2');
    expect((await memory.search('u1', 'pizza')).results).toEqual([]);
  });
});

describe('TemporalMemory.list', () => {
  it('hides a temporary state once it expires', async () => {
    const memory = makeMemory();
    await memory.writeFacts([candidate({ text: 'User has a cold', category: 'temp_state', slot: 'health' })], 'u1');

    expect((await memory.list('u1')).map((r) => r.text)).toEqual(['User has a cold']);
    clock.advanceDays(7);
    expect(await memory.list('u1')).toEqual([]);
  });
});

describe('TemporalMemory.delete', () => {
  it('marks the record deleted and removes its vector', async () => {
    const memory = makeMemory();
    const [rec] = (await memory.writeFacts([candidate()], 'u1')).records;

    const result = await memory.delete('u1', rec.id);

    expect(result.deleted.status).toBe('deleted');
    expect(result.deleted.version).toBe(2);
    expect(result.indexingLag).toBeNull();
    expect(await memory.list('u1')).toEqual([]);
    expect(await stores.vectorIndex.search('u1', [1, 0.05, 0.05, 0.05], 10)).toEqual([]);
  });

  it('frees the slot for a new record', async () => {
    const memory = makeMemory();
    const [pizza] = (await memory.writeFacts([candidate()], 'u1')).records;
    await memory.delete('u1', pizza.id);

    const [sushi] = (await memory.writeFacts([candidate({ text: 'User likes sushi' })], 'u1')).records;
    expect(sushi.supersedes).toEqual([]);
  });

  it('treats a record of another user as missing', async () => {
    const memory = makeMemory();
    const [rec] = (await memory.writeFacts([candidate()], 'u1')).records;

    await expect(memory.delete('u2', rec.id)).rejects.toBeInstanceOf(RecordNotFoundError);
    await expect(memory.delete('u1', 'nope')).rejects.toThrow('Memory not found: nope');
  });

  it('rejects deleting a record that is not active', async () => {
    const memory = makeMemory();
    const [pizza] = (await memory.writeFacts([candidate()], 'u1')).records;
    await memory.writeFacts([candidate({ text: 'User likes sushi' })], 'u1');

    const attempt = memory.delete('u1', pizza.id);
    await expect(attempt).rejects.toBeInstanceOf(ValidationError);
    await expect(memory.delete('u1', pizza.id)).rejects.toThrow(
      `Validation failed: memory ${pizza.id} is archived and cannot be deleted`,
    );
  });
});

describe('TemporalMemory.reindex', () => {
  it('re-embeds active records that missed indexing', async () => {
    embedder.failing = true;
    const memory = makeMemory();
    const [rec] = (await memory.writeFacts([candidate()], 'u1')).records;
    embedder.failing = false;

    const result = await memory.reindex([rec.id]);

    expect(result).toEqual({ indexed: [rec.id], failed: [] });
    const matches = await stores.vectorIndex.search('u1', [1, 0.05, 0.05, 0.05], 10);
    expect(matches.map((m) => m.id)).toEqual([rec.id]);
  });

  it('drops vectors of records that are no longer active', async () => {
    const memory = makeMemory();
    const [rec] = (await memory.writeFacts([candidate()], 'u1')).records;
    await stores.metadata.updateStatus(rec.id, 'archived', 1);

    const result = await memory.reindex([rec.id]);

    expect(result).toEqual({ indexed: [rec.id], failed: [] });
    expect(await stores.vectorIndex.search('u1', [1, 0.05, 0.05, 0.05], 10)).toEqual([]);
  });

  it('reports unknown ids and embedding failures per record', async () => {
    const memory = makeMemory();
    const [rec] = (await memory.writeFacts([candidate()], 'u1')).records;
    embedder.failing = true;

    const result = await memory.reindex(['ghost', rec.id]);

    expect(result.indexed).toEqual([]);
    expect(result.failed).toEqual([
      { memoryId: 'ghost', code: 'record_not_found', message: 'Memory not found: ghost' },
      { memoryId: rec.id, code: 'embedding_error', message: 'Embedding failed: service unavailable' },
    ]);
  });
});

describe('TemporalMemory.history', () => {
  it('walks the supersession chain newest first', async () => {
    const memory = makeMemory();
    const [pizza] = (await memory.writeFacts([candidate({ text: 'User likes pizza' })], 'u1')).records;
    clock.advanceDays(1);
    const [sushi] = (await memory.writeFacts([candidate({ text: 'User likes sushi' })], 'u1')).records;
    clock.advanceDays(1);
    const [ramen] = (await memory.writeFacts([candidate({ text: 'User likes ramen' })], 'u1')).records;

    const chain = await memory.history('u1', ramen.id);

    expect(chain.map((r) => [r.id, r.status])).toEqual([
      [ramen.id, 'active'],
      [sushi.id, 'archived'],
      [pizza.id, 'archived'],
    ]);
  });

  it('throws for an unknown id', async () => {
    await expect(makeMemory().history('u1', 'ghost')).rejects.toBeInstanceOf(RecordNotFoundError);
  });

  it('hides the chain of another user', async () => {
    const memory = makeMemory();
    const [pizza] = (await memory.writeFacts([candidate()], 'u1')).records;

    await expect(memory.history('u2', pizza.id)).rejects.toBeInstanceOf(RecordNotFoundError);
    await expect(memory.get('u2', pizza.id)).rejects.toThrow(`Memory not found: ${pizza.id}`);
    expect((await memory.get('u1', pizza.id)).text).toBe('User likes pizza');
  });
});

describe('TemporalMemory.close', () => {
  it('runs the close hook', () => {
    const close = vi.fn();
    makeMemory({ close }).close();
    expect(close).toHaveBeenCalledOnce();
  });
});
