import { z } from 'zod';

const halfLifeSchema = z.number().int().positive().nullable();
const validitySchema = z.number().positive().nullable();

export const storeConfigSchema = z.object({
  metadataPath: z.string().default('.tempora/metadata.db'),
  writeRetries: z.number().int().min(0).max(10).default(3),
  lockLeaseMs: z.number().int().min(100).default(30_000),
  lockWaitMs: z.number().int().min(0).default(10_000),
});

export const qdrantConfigSchema = z.object({
  url: z.string().url().default('http://localhost:6333'),
  apiKey: z.string().min(1).optional(),
  collection: z.string().min(1).default('temporal_mem_default'),
});

export const vectorConfigSchema = z.object({
  backend: z.enum(['sqlite', 'qdrant']).default('sqlite'),
  sqlitePath: z.string().default('.tempora/vectors.db'),
  qdrant: qdrantConfigSchema.default({}),
  dimension: z.number().int().positive().default(1536),
  distance: z.enum(['cosine', 'dot']).default('cosine'),
});

export const providerNameSchema = z.enum(['openai', 'ollama']);

export const embeddingConfigSchema = z.object({
  provider: providerNameSchema.default('openai'),
  model: z.string().min(1).default('text-embedding-3-small'),
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
});

export const extractionConfigSchema = z.object({
  provider: providerNameSchema.default('openai'),
  model: z.string().min(1).default('gpt-4o-mini'),
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
  minConfidence: z.number().min(0).max(1).default(0),
});

export const decayConfigSchema = z.object({
  halfLifeDays: z.object({
    profile_fact: halfLifeSchema.default(null),
    preference: halfLifeSchema.default(180),
    episodic_event: halfLifeSchema.default(30),
    temp_state: halfLifeSchema.default(2),
    task_state: halfLifeSchema.default(7),
    other: halfLifeSchema.default(90),
  }).default({}),
  validityDays: z.object({
    profile_fact: validitySchema.default(null),
    preference: validitySchema.default(null),
    episodic_event: validitySchema.default(null),
    temp_state: validitySchema.default(7),
    task_state: validitySchema.default(null),
    other: validitySchema.default(null),
  }).default({}),
});

export const loggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  pretty: z.boolean().default(false),
});

export const serverConfigSchema = z.object({
  port: z.number().int().min(1).max(65535).default(3928),
  host: z.string().default('127.0.0.1'),
  apiKey: z.string().optional(),
});

export const temporaConfigSchema = z.object({
  store: storeConfigSchema.default({}),
  vector: vectorConfigSchema.default({}),
  embedding: embeddingConfigSchema.default({}),
  extraction: extractionConfigSchema.default({}),
  decay: decayConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
  server: serverConfigSchema.default({}),
});
