// ============================================================================
// Tempora memory model
// Closed variants for categories, types and statuses so ranking and tests can
// enumerate every case.
// ============================================================================

// --- Closed variants ---

export const FACT_CATEGORIES = ['profile', 'preference', 'event', 'temp_state', 'other'] as const;
export type FactCategory = (typeof FACT_CATEGORIES)[number];

export const MEMORY_TYPES = [
  'profile_fact',
  'preference',
  'episodic_event',
  'temp_state',
  'task_state',
  'other',
] as const;
export type MemoryType = (typeof MEMORY_TYPES)[number];

export const MEMORY_STATUSES = ['active', 'archived', 'deleted'] as const;
export type MemoryStatus = (typeof MEMORY_STATUSES)[number];

// --- Input from extraction ---

export interface FactCandidate {
  text: string;
  category: FactCategory;
  slot: string | null;
  confidence: number;       // 0-1
}

export interface ConversationMessage {
  role: 'user' | 'assistant' | 'system';
  content: string;
}

// --- Persisted unit ---

export interface MemoryRecord {
  id: string;
  userId: string;
  text: string;
  type: MemoryType;
  slot: string | null;
  status: MemoryStatus;
  createdAt: string;             // ISO-8601, set once
  validUntil: string | null;     // ISO-8601, >= createdAt
  decayHalfLifeDays: number | null;
  confidence: number;
  supersedes: readonly string[]; // fixed at creation
  sourceTurnId: string | null;
  extra: Record<string, unknown>;
  version: number;               // bumped on every status change
}

// --- Conflict resolution ---

export interface ResolutionPlan {
  insert: MemoryRecord;
  archive: string[];
}

// --- Ranking ---

export interface ScoredMemory {
  record: MemoryRecord;
  score: number;
  similarity: number;
  decayFactor: number;
}

// --- Write results ---

export interface CandidateFailure {
  candidate: FactCandidate | null;
  code: string;
  message: string;
}

export interface IndexingLag {
  memoryId: string;
  code: string;
  message: string;
}

export interface BatchWriteResult {
  records: MemoryRecord[];
  failures: CandidateFailure[];
  indexingLag: IndexingLag[];
}

export interface ReindexResult {
  indexed: string[];
  failed: IndexingLag[];
}

// --- Read results ---

export type DegradedReason = 'embedding' | 'vector-index';

export interface SearchResult {
  results: ScoredMemory[];
  degraded: boolean;
  reason?: DegradedReason;
}

export interface MemorySearchFilters {
  type?: MemoryType;
  slot?: string;
  status?: MemoryStatus;
}
