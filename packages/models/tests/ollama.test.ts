import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { EmbeddingError, ExtractionError } from '@tempora/shared';
import { OllamaEmbedder, OllamaFactExtractor } from '../src/providers/ollama.js';

const mockFetch = vi.fn();

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

beforeEach(() => {
  mockFetch.mockReset();
  vi.stubGlobal('fetch', mockFetch);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('OllamaEmbedder', () => {
  const embedder = new OllamaEmbedder({ model: 'nomic-embed-text' }, 2);

  it('posts all texts to /api/embed in one call', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ embeddings: [[1, 0], [0, 1]] }));

    expect(await embedder.embedMany(['a', 'b'])).toEqual([[1, 0], [0, 1]]);
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('http://localhost:11434/api/embed');
    expect(JSON.parse(init.body)).toEqual({ model: 'nomic-embed-text', input: ['a', 'b'] });
  });

  it('embeds a single text', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ embeddings: [[0.5, 0.5]] }));
    expect(await embedder.embed('hello')).toEqual([0.5, 0.5]);
  });

  it('reports HTTP errors as EmbeddingError', async () => {
    mockFetch.mockResolvedValue(new Response('model not found', { status: 404 }));

    await expect(embedder.embed('hello'))
      .rejects.toThrow('Embedding failed: Ollama API error (404): model not found');
  });

  it('rejects malformed responses', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ embedding: [1, 0] }));
    await expect(embedder.embed('hello')).rejects.toBeInstanceOf(EmbeddingError);
  });

  it('rejects vectors of the wrong dimension', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ embeddings: [[1, 0, 0]] }));
    await expect(embedder.embed('hello')).rejects.toThrow('ollama returned 3 dimensions, expected 2');
  });
});

describe('OllamaFactExtractor', () => {
  const extractor = new OllamaFactExtractor({ model: 'llama3.2:3b', baseUrl: 'http://ollama.test:11434' });

  it('asks for JSON and parses the reply', async () => {
    mockFetch.mockResolvedValue(jsonResponse({
      message: {
        role: 'assistant',
        content: '{"facts": [{"text": "User has a cold", "category": "temp_state", "slot": "health", "confidence": 0.9}]}',
      },
      done: true,
    }));

    const facts = await extractor.extract([{ role: 'user', content: "I've got a cold" }]);

    expect(facts).toEqual([{ text: 'User has a cold', category: 'temp_state', slot: 'health', confidence: 0.9 }]);
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('http://ollama.test:11434/api/chat');
    const body = JSON.parse(init.body);
    expect(body.format).toBe('json');
    expect(body.stream).toBe(false);
  });

  it('wraps network failures in ExtractionError', async () => {
    mockFetch.mockRejectedValue(new TypeError('fetch failed'));

    await expect(extractor.extract([{ role: 'user', content: 'hi' }]))
      .rejects.toThrow('Fact extraction failed: fetch failed');
  });

  it('surfaces non-JSON model output as ExtractionError', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ message: { content: 'I could not find any facts.' } }));
    await expect(extractor.extract([{ role: 'user', content: 'hi' }])).rejects.toBeInstanceOf(ExtractionError);
  });
});
