import type { FactCategory, MemoryType } from './types/memory.js';
import type { TemporaConfig } from './types/config.js';
import { temporaConfigSchema } from './schemas/config.schema.js';

export const TEMPORA_VERSION = '0.1.0';

export const CATEGORY_TO_TYPE: Record<FactCategory, MemoryType> = {
  profile: 'profile_fact',
  preference: 'preference',
  event: 'episodic_event',
  temp_state: 'temp_state',
  other: 'other',
};

export const DEFAULT_CONFIG: TemporaConfig = temporaConfigSchema.parse({});
