import {
  ConfigError,
  type EmbeddingConfig,
  type ExtractionConfig,
  type ProviderName,
} from '@tempora/shared';
import type { EmbeddingProvider, FactExtractionProvider } from './provider.js';
import { OpenAIEmbedder, OpenAIFactExtractor } from './providers/openai.js';
import { OllamaEmbedder, OllamaFactExtractor } from './providers/ollama.js';

type EmbedderFactory = (config: EmbeddingConfig, dimension: number) => EmbeddingProvider;
type ExtractorFactory = (config: ExtractionConfig) => FactExtractionProvider;

function requireOpenAIKey(apiKey: string | undefined): string {
  const key = apiKey ?? process.env.OPENAI_API_KEY;
  if (!key) {
    throw new ConfigError('an OpenAI API key is required (set apiKey or TEMPORA_OPENAI_API_KEY)');
  }
  return key;
}

const embedders: Record<ProviderName, EmbedderFactory> = {
  openai: (config, dimension) =>
    new OpenAIEmbedder({ apiKey: requireOpenAIKey(config.apiKey), model: config.model, baseUrl: config.baseUrl }, dimension),
  ollama: (config, dimension) => new OllamaEmbedder({ model: config.model, baseUrl: config.baseUrl }, dimension),
};

const extractors: Record<ProviderName, ExtractorFactory> = {
  openai: (config) =>
    new OpenAIFactExtractor({ apiKey: requireOpenAIKey(config.apiKey), model: config.model, baseUrl: config.baseUrl }),
  ollama: (config) => new OllamaFactExtractor({ model: config.model, baseUrl: config.baseUrl }),
};

/** Build the embedder named by config; vectors must have `dimension` entries. */
export function createEmbedder(config: EmbeddingConfig, dimension: number): EmbeddingProvider {
  return embedders[config.provider](config, dimension);
}

export function createFactExtractor(config: ExtractionConfig): FactExtractionProvider {
  return extractors[config.provider](config);
}
