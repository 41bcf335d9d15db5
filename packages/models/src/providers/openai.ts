import OpenAI from 'openai';
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

export interface OpenAIProviderConfig {
  apiKey: string;
  model: string;
  baseUrl?: string;
}

export class OpenAIEmbedder extends EmbeddingProvider {
  readonly name: ProviderName = 'openai';

  private client: OpenAI;
  private model: string;

  constructor(config: OpenAIProviderConfig, readonly dimension: number) {
    super();
    this.client = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl });
    this.model = config.model;
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.request(text);
    if (!vector) throw new EmbeddingError('openai returned no embedding');
    return vector;
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    const vectors = await this.request(texts);
    if (vectors.length !== texts.length) {
      throw new EmbeddingError(`openai returned ${vectors.length} embeddings for ${texts.length} inputs`);
    }
    return vectors;
  }

  private async request(input: string | string[]): Promise<number[][]> {
    const response = await this.client.embeddings.create({ model: this.model, input }).catch((err: unknown) => {
      throw new EmbeddingError(errorMessage(err), { cause: err });
    });
    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map((d) => this.checkDimension(d.embedding));
  }
}

export class OpenAIFactExtractor extends FactExtractionProvider {
  readonly name: ProviderName = 'openai';

  private client: OpenAI;
  private model: string;

  constructor(config: OpenAIProviderConfig) {
    super();
    this.client = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl });
    this.model = config.model;
  }

  async extract(messages: ConversationMessage[]): Promise<FactCandidate[]> {
    if (messages.length === 0) return [];

    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        temperature: 0,
        response_format: { type: 'json_object' },
        messages: [
          { role: 'system', content: FACT_EXTRACTION_PROMPT },
          { role: 'user', content: formatTranscript(messages) },
        ],
      });
      return parseExtraction(response.choices[0]?.message?.content ?? '');
    } catch (err) {
      if (err instanceof TemporaError) throw err;
      throw new ExtractionError(errorMessage(err), { cause: err });
    }
  }
}
