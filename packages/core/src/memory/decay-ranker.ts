import { ageInDays, type MemoryRecord, type MemoryStatus, type ScoredMemory } from '@tempora/shared';

export interface RankOptions {
  /**
   * Cosine similarity per record id. When given, ids missing from the map
   * score 0; when omitted every record gets similarity 1 (list ordering).
   */
  similarity?: ReadonlyMap<string, number>;
  /** Evaluation time. Defaults to the wall clock. */
  now?: Date;
  /** Status to keep. Only listing asks for anything but 'active'. */
  status?: MemoryStatus;
}

/** Relevance multiplier for a record of the given age. */
export function decayFactor(record: Pick<MemoryRecord, 'createdAt' | 'decayHalfLifeDays'>, now: Date): number {
  if (record.decayHalfLifeDays === null) return 1;
  return Math.pow(0.5, ageInDays(record.createdAt, now) / record.decayHalfLifeDays);
}

/** A record whose validity window has closed at `now`. Status does not matter. */
export function isExpired(record: Pick<MemoryRecord, 'validUntil'>, now: Date): boolean {
  return record.validUntil !== null && Date.parse(record.validUntil) <= now.getTime();
}

/**
 * Filter to unexpired records in one status (active unless asked otherwise)
 * and order them by similarity x decay x confidence, newest first on ties,
 * then by id.
 * Inputs are not mutated.
 */
export function rankScored(records: readonly MemoryRecord[], options: RankOptions = {}): ScoredMemory[] {
  const now = options.now ?? new Date();
  const scores = options.similarity;
  const status = options.status ?? 'active';

  return records
    .filter((r) => r.status === status && !isExpired(r, now))
    .map((record) => {
      const similarity = scores ? scores.get(record.id) ?? 0 : 1;
      const decay = decayFactor(record, now);
      return { record, similarity, decayFactor: decay, score: similarity * decay * record.confidence };
    })
    .sort(
      (a, b) =>
        b.score - a.score ||
        Date.parse(b.record.createdAt) - Date.parse(a.record.createdAt) ||
        compareIds(a.record.id, b.record.id),
    );
}

export function rank(records: readonly MemoryRecord[], options: RankOptions = {}): MemoryRecord[] {
  return rankScored(records, options).map((s) => s.record);
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export class DecayRanker {
  rank(records: readonly MemoryRecord[], options?: RankOptions): MemoryRecord[] {
    return rank(records, options);
  }

  rankScored(records: readonly MemoryRecord[], options?: RankOptions): ScoredMemory[] {
    return rankScored(records, options);
  }
}
