// ── Types ────────────────────────────────────────────────────────
export { FACT_CATEGORIES, MEMORY_TYPES, MEMORY_STATUSES } from './types/memory.js';
export type {
  FactCategory,
  MemoryType,
  MemoryStatus,
  FactCandidate,
  ConversationMessage,
  MemoryRecord,
  ResolutionPlan,
  ScoredMemory,
  CandidateFailure,
  IndexingLag,
  BatchWriteResult,
  ReindexResult,
  DegradedReason,
  SearchResult,
  MemorySearchFilters,
} from './types/memory.js';
export type {
  MetadataStore,
  SlotLock,
  VectorIndex,
  VectorPayload,
  VectorMatch,
  Embedder,
  FactExtractor,
} from './types/contracts.js';
export type {
  TemporaConfig,
  TemporaConfigInput,
  StoreConfig,
  VectorConfig,
  EmbeddingConfig,
  ExtractionConfig,
  DecayConfig,
  LoggingConfig,
  ServerConfig,
  ProviderName,
} from './types/config.js';

// ── Schemas ──────────────────────────────────────────────────────
export {
  temporaConfigSchema,
  storeConfigSchema,
  vectorConfigSchema,
  qdrantConfigSchema,
  embeddingConfigSchema,
  extractionConfigSchema,
  decayConfigSchema,
  loggingConfigSchema,
  serverConfigSchema,
  providerNameSchema,
} from './schemas/config.schema.js';
export {
  factCategorySchema,
  memoryTypeSchema,
  memoryStatusSchema,
  slotSchema,
  factCandidateSchema,
  conversationMessageSchema,
  ingestRequestSchema,
  factsRequestSchema,
  searchQuerySchema,
  listQuerySchema,
  userQuerySchema,
  reindexRequestSchema,
} from './schemas/memory.schema.js';

// ── Constants & utils ────────────────────────────────────────────
export { TEMPORA_VERSION, CATEGORY_TO_TYPE, DEFAULT_CONFIG } from './constants.js';
export * from './utils/index.js';
