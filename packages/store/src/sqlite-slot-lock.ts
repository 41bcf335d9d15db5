import type Database from 'better-sqlite3';
import { setTimeout as sleep } from 'node:timers/promises';
import { generateId, SlotLockTimeoutError, type SlotLock } from '@tempora/shared';

export interface SlotLockOptions {
  /** How long a held lock stays valid if its holder never releases it. */
  leaseMs: number;
  /** How long to wait for a busy slot before giving up. */
  waitMs: number;
  /** First retry delay; doubles up to maxPollMs. */
  pollMs?: number;
  maxPollMs?: number;
}

/**
 * Per-(user, slot) lease lock kept in the metadata database, so every process
 * sharing the file sees the same holder. Expired leases are taken over.
 */
export class SqliteSlotLock implements SlotLock {
  private acquireStmt: Database.Statement<[string, string, string, number, number]>;
  private releaseStmt: Database.Statement<[string, string, string]>;
  private readonly pollMs: number;
  private readonly maxPollMs: number;

  constructor(db: Database.Database, private readonly options: SlotLockOptions) {
    this.acquireStmt = db.prepare<[string, string, string, number, number]>(`
      INSERT INTO slot_locks (user_id, slot, holder, expires_at) VALUES (?, ?, ?, ?)
      ON CONFLICT (user_id, slot) DO UPDATE
        SET holder = excluded.holder, expires_at = excluded.expires_at
        WHERE slot_locks.expires_at <= ?
    `);
    this.releaseStmt = db.prepare<[string, string, string]>(
      'DELETE FROM slot_locks WHERE user_id = ? AND slot = ? AND holder = ?',
    );
    this.pollMs = options.pollMs ?? 5;
    this.maxPollMs = options.maxPollMs ?? 100;
  }

  async runExclusive<T>(userId: string, slot: string, fn: () => Promise<T>): Promise<T> {
    const holder = await this.acquire(userId, slot);
    try {
      return await fn();
    } finally {
      this.releaseStmt.run(userId, slot, holder);
    }
  }

  private async acquire(userId: string, slot: string): Promise<string> {
    const holder = generateId('lock');
    const started = Date.now();
    let delay = this.pollMs;

    for (;;) {
      const now = Date.now();
      if (this.acquireStmt.run(userId, slot, holder, now + this.options.leaseMs, now).changes === 1) {
        return holder;
      }
      if (now - started >= this.options.waitMs) {
        throw new SlotLockTimeoutError(userId, slot, now - started);
      }
      await sleep(delay);
      delay = Math.min(delay * 2, this.maxPollMs);
    }
  }
}
