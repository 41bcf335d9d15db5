import { z } from 'zod';
import { FACT_CATEGORIES, MEMORY_STATUSES, MEMORY_TYPES } from '../types/memory.js';

export const factCategorySchema = z.enum(FACT_CATEGORIES);
export const memoryTypeSchema = z.enum(MEMORY_TYPES);
export const memoryStatusSchema = z.enum(MEMORY_STATUSES);

/** Blank strings and the literal "null" some extractors emit both mean no slot. */
export const slotSchema = z
  .string()
  .nullish()
  .transform((slot) => {
    const trimmed = slot?.trim();
    return trimmed && trimmed.toLowerCase() !== 'null' ? trimmed : null;
  });

export const factCandidateSchema = z.object({
  text: z.string().trim().min(1).max(2_000),
  category: factCategorySchema,
  slot: slotSchema,
  confidence: z.number().min(0).max(1),
});

export const conversationMessageSchema = z.object({
  role: z.enum(['user', 'assistant', 'system']),
  content: z.string(),
});

// --- HTTP request bodies / query strings ---

export const ingestRequestSchema = z.object({
  userId: z.string().min(1),
  messages: z.array(conversationMessageSchema).min(1),
  sourceTurnId: z.string().min(1).optional(),
});

export const factsRequestSchema = z.object({
  userId: z.string().min(1),
  candidates: z.array(factCandidateSchema).min(1),
  sourceTurnId: z.string().min(1).optional(),
});

export const searchQuerySchema = z.object({
  userId: z.string().min(1),
  q: z.string().min(1),
  limit: z.coerce.number().int().min(1).max(100).default(10),
  type: memoryTypeSchema.optional(),
  slot: z.string().min(1).optional(),
});

export const listQuerySchema = z.object({
  userId: z.string().min(1),
  status: memoryStatusSchema.default('active'),
});

export const userQuerySchema = z.object({
  userId: z.string().min(1),
});

export const reindexRequestSchema = z.object({
  ids: z.array(z.string().min(1)).min(1),
});
