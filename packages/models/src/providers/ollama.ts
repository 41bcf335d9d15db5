import { z } from 'zod';
import {
  EmbeddingError,
  ExtractionError,
  TemporaError,
  errorMessage,
  type ConversationMessage,
  type FactCandidate,
  type ProviderName,
} from '@tempora/shared';
import { EmbeddingProvider, FactExtractionProvider } from '../provider.js';
import { parseExtraction } from '../extraction-parser.js';
import { FACT_EXTRACTION_PROMPT, formatTranscript } from '../prompts/fact-extraction.js';

export const OLLAMA_DEFAULT_URL = 'http://localhost:11434';

export interface OllamaProviderConfig {
  model: string;
  baseUrl?: string;
}

const embedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

const chatResponseSchema = z.object({
  message: z.object({ content: z.string() }).optional(),
});

async function postJson(url: string, body: unknown): Promise<unknown> {
  const res = await fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });

  if (!res.ok) {
    const text = await res.text();
    throw new Error(`Ollama API error (${res.status}): ${text}`);
  }
  return res.json();
}

export class OllamaEmbedder extends EmbeddingProvider {
  readonly name: ProviderName = 'ollama';

  private baseUrl: string;
  private model: string;

  constructor(config: OllamaProviderConfig, readonly dimension: number) {
    super();
    this.baseUrl = config.baseUrl ?? OLLAMA_DEFAULT_URL;
    this.model = config.model;
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedMany([text]);
    if (!vector) throw new EmbeddingError('ollama returned no embedding');
    return vector;
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    let data: unknown;
    try {
      data = await postJson(`${this.baseUrl}/api/embed`, { model: this.model, input: texts });
    } catch (err) {
      throw new EmbeddingError(errorMessage(err), { cause: err });
    }

    const parsed = embedResponseSchema.safeParse(data);
    if (!parsed.success) throw new EmbeddingError('unexpected response from ollama /api/embed');
    if (parsed.data.embeddings.length !== texts.length) {
      throw new EmbeddingError(
        `ollama returned ${parsed.data.embeddings.length} embeddings for ${texts.length} inputs`,
      );
    }
    return parsed.data.embeddings.map((v) => this.checkDimension(v));
  }
}

export class OllamaFactExtractor extends FactExtractionProvider {
  readonly name: ProviderName = 'ollama';

  private baseUrl: string;
  private model: string;

  constructor(config: OllamaProviderConfig) {
    super();
    this.baseUrl = config.baseUrl ?? OLLAMA_DEFAULT_URL;
    this.model = config.model;
  }

  async extract(messages: ConversationMessage[]): Promise<FactCandidate[]> {
    if (messages.length === 0) return [];

    try {
      const data = await postJson(`${this.baseUrl}/api/chat`, {
        model: this.model,
        stream: false,
        format: 'json',
        options: { temperature: 0 },
        messages: [
          { role: 'system', content: FACT_EXTRACTION_PROMPT },
          { role: 'user', content: formatTranscript(messages) },
        ],
      });
      const parsed = chatResponseSchema.safeParse(data);
      if (!parsed.success) throw new ExtractionError('unexpected response from ollama /api/chat');
      return parseExtraction(parsed.data.message?.content ?? '');
    } catch (err) {
      if (err instanceof TemporaError) throw err;
      throw new ExtractionError(errorMessage(err), { cause: err });
    }
  }
}
