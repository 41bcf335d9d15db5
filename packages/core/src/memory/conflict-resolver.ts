import type { MemoryRecord, ResolutionPlan } from '@tempora/shared';

/**
 * Decide how a new record enters its slot. Every record currently active in
 * the slot is archived and becomes a supersedes target of the new record,
 * even when a lost race left more than one. Slotless records never conflict.
 * Pure: no I/O, safe to call again on each retry.
 */
export function resolveConflicts(
  draft: MemoryRecord,
  activeInSlot: readonly MemoryRecord[],
): ResolutionPlan {
  if (draft.slot === null) {
    return { insert: { ...draft, supersedes: [] }, archive: [] };
  }

  const archive = [...new Set(activeInSlot.map((r) => r.id))].sort();
  return {
    insert: { ...draft, supersedes: [...archive] },
    archive,
  };
}

export class ConflictResolver {
  resolve(draft: MemoryRecord, activeInSlot: readonly MemoryRecord[]): ResolutionPlan {
    return resolveConflicts(draft, activeInSlot);
  }
}
