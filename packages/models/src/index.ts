export { EmbeddingProvider, FactExtractionProvider } from './provider.js';
export { createEmbedder, createFactExtractor } from './registry.js';
export { parseExtraction } from './extraction-parser.js';
export { FACT_EXTRACTION_PROMPT, formatTranscript } from './prompts/fact-extraction.js';
export { OpenAIEmbedder, OpenAIFactExtractor } from './providers/openai.js';
export type { OpenAIProviderConfig } from './providers/openai.js';
export { OllamaEmbedder, OllamaFactExtractor, OLLAMA_DEFAULT_URL } from './providers/ollama.js';
export type { OllamaProviderConfig } from './providers/ollama.js';
