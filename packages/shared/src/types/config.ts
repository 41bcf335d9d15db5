import type { z } from 'zod';
import type {
  temporaConfigSchema,
  storeConfigSchema,
  vectorConfigSchema,
  embeddingConfigSchema,
  extractionConfigSchema,
  decayConfigSchema,
  loggingConfigSchema,
  serverConfigSchema,
  providerNameSchema,
} from '../schemas/config.schema.js';

export type TemporaConfig = z.infer<typeof temporaConfigSchema>;
export type StoreConfig = z.infer<typeof storeConfigSchema>;
export type VectorConfig = z.infer<typeof vectorConfigSchema>;
export type EmbeddingConfig = z.infer<typeof embeddingConfigSchema>;
export type ExtractionConfig = z.infer<typeof extractionConfigSchema>;
export type DecayConfig = z.infer<typeof decayConfigSchema>;
export type LoggingConfig = z.infer<typeof loggingConfigSchema>;
export type ServerConfig = z.infer<typeof serverConfigSchema>;
export type ProviderName = z.infer<typeof providerNameSchema>;

/** Config as written in a file or built from env vars, before defaults apply. */
export type TemporaConfigInput = z.input<typeof temporaConfigSchema>;
