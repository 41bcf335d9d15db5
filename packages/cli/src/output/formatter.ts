import type {
  BatchWriteResult,
  MemoryRecord,
  ReindexResult,
  ScoredMemory,
  SearchResult,
} from '@tempora/shared';
import type { DeleteResult } from '@tempora/core';

export function truncate(str: string, max: number): string {
  if (str.length <= max) return str;
  return str.slice(0, max - 3) + '...';
}

/** `<id>  <date>  <type>[slot]  <text>`, with the status appended when not active. */
export function formatRecord(record: MemoryRecord): string {
  const slot = record.slot ? `[${record.slot}]` : '';
  const status = record.status === 'active' ? '' : ` (${record.status})`;
  return `${record.id}  ${record.createdAt.slice(0, 10)}  ${record.type}${slot}  ${record.text}${status}`;
}

export function formatRecords(records: readonly MemoryRecord[]): string {
  if (records.length === 0) return 'No memories found.';
  return records.map(formatRecord).join('\n');
}

export function formatScored(scored: ScoredMemory): string {
  return `${scored.score.toFixed(3)}  ${formatRecord(scored.record)}`;
}

export function formatSearchResult(result: SearchResult): string {
  const lines: string[] = [];

  if (result.degraded) {
    lines.push(`[DEGRADED] similarity unavailable (${result.reason ?? 'unknown'}), ranked by confidence and age only`);
  }
  if (result.results.length === 0) {
    lines.push('No memories found.');
  } else {
    lines.push(...result.results.map(formatScored));
  }

  return lines.join('\n');
}

export function formatBatchResult(result: BatchWriteResult): string {
  const lines: string[] = [];

  lines.push(`[OK] ${result.records.length} ${result.records.length === 1 ? 'memory' : 'memories'} written`);
  for (const record of result.records) {
    const replaced = record.supersedes.length > 0 ? ` (supersedes ${record.supersedes.join(', ')})` : '';
    lines.push(`  + ${formatRecord(record)}${replaced}`);
  }

  for (const failure of result.failures) {
    const what = failure.candidate ? ` "${truncate(failure.candidate.text, 60)}"` : '';
    lines.push(`[FAIL]${what} ${failure.code}: ${failure.message}`);
  }

  if (result.indexingLag.length > 0) {
    for (const lag of result.indexingLag) {
      lines.push(`[LAG] ${lag.memoryId} ${lag.code}: ${lag.message}`);
    }
    lines.push(`  -> run: tempora reindex ${result.indexingLag.map((l) => l.memoryId).join(' ')}`);
  }

  return lines.join('\n');
}

export function formatDeleteResult(result: DeleteResult): string {
  const lines = [`[OK] deleted ${result.deleted.id}`];
  if (result.indexingLag) {
    lines.push(`[LAG] ${result.indexingLag.code}: ${result.indexingLag.message}`);
  }
  return lines.join('\n');
}

export function formatReindexResult(result: ReindexResult): string {
  const lines = [`[OK] ${result.indexed.length} reindexed, ${result.failed.length} failed`];
  for (const failure of result.failed) {
    lines.push(`[FAIL] ${failure.memoryId} ${failure.code}: ${failure.message}`);
  }
  return lines.join('\n');
}

export function formatJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
