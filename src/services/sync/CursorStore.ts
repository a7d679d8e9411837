import { Database } from 'sqlite';
import { SyncCursor, SyncCursorRow } from '../../types/models';
import { syncCursorRowToModel } from '../../models/transformers';
import { KeyedMutex } from '../../utils/KeyedMutex';

export interface AdvanceOptions {
  // A resync may move the cursor backwards in time
  resync?: boolean;
  processed?: number;
}

export class CursorRegression extends Error {
  constructor(mailboxId: string, current: Date, proposed: Date) {
    super(`Refusing to move cursor for ${mailboxId} back from ${current.toISOString()} to ${proposed.toISOString()}`);
    this.name = 'CursorRegression';
  }
}

/**
 * CursorStore persists the per-mailbox delta cursor together with sync
 * bookkeeping. Writes for a mailbox are serialized, and each cursor
 * update is a single upsert so a crash leaves either the old or the new
 * cursor in place.
 */
export class CursorStore {
  private writes = new KeyedMutex();

  constructor(private db: Database) {}

  /**
   * Get the cursor for a mailbox, or null when it has never been synced
   */
  async get(mailboxId: string): Promise<SyncCursor | null> {
    const row = await this.db.get<SyncCursorRow>(
      'SELECT * FROM sync_cursors WHERE mailbox_id = ?',
      [mailboxId]
    );

    return row ? syncCursorRowToModel(row) : null;
  }

  /**
   * Get the cursor for a mailbox, creating an empty entry on first use
   */
  async ensure(mailboxId: string): Promise<SyncCursor> {
    await this.db.run(
      'INSERT OR IGNORE INTO sync_cursors (mailbox_id, total_processed, current_sync_status) VALUES (?, 0, ?)',
      [mailboxId, 'idle']
    );

    const cursor = await this.get(mailboxId);
    if (!cursor) {
      throw new Error(`Sync cursor for ${mailboxId} could not be created`);
    }
    return cursor;
  }

  async list(): Promise<SyncCursor[]> {
    const rows = await this.db.all<SyncCursorRow[]>('SELECT * FROM sync_cursors ORDER BY mailbox_id');
    return (rows || []).map(syncCursorRowToModel);
  }

  /**
   * Replace the cursor for a mailbox. Unless this is a resync, a cursor
   * older than the stored one is rejected.
   */
  async advance(
    mailboxId: string,
    cursor: string,
    cursorAt: Date,
    options: AdvanceOptions = {}
  ): Promise<SyncCursor> {
    return this.writes.runExclusive(mailboxId, async () => {
      const now = new Date().toISOString();

      const result = await this.db.run(
        `INSERT INTO sync_cursors (mailbox_id, cursor, cursor_at, last_sync_at, total_processed, current_sync_status)
         VALUES (?, ?, ?, ?, ?, 'idle')
         ON CONFLICT(mailbox_id) DO UPDATE SET
           cursor = excluded.cursor,
           cursor_at = excluded.cursor_at,
           last_sync_at = excluded.last_sync_at,
           total_processed = sync_cursors.total_processed + excluded.total_processed
         WHERE ? = 1 OR sync_cursors.cursor_at IS NULL OR sync_cursors.cursor_at <= excluded.cursor_at`,
        [mailboxId, cursor, cursorAt.toISOString(), now, options.processed ?? 0, options.resync ? 1 : 0]
      );

      const stored = await this.get(mailboxId);
      if (!stored) {
        throw new Error(`Sync cursor for ${mailboxId} disappeared during update`);
      }

      if ((result.changes ?? 0) === 0) {
        throw new CursorRegression(mailboxId, stored.cursorAt ?? cursorAt, cursorAt);
      }

      return stored;
    });
  }

  /**
   * Try to acquire a sync "lock" by setting status to 'syncing' only if not already syncing.
   * Returns true if the lock was acquired.
   */
  async tryAcquireSyncLock(mailboxId: string): Promise<boolean> {
    await this.ensure(mailboxId);
    const result = await this.db.run(
      `UPDATE sync_cursors SET current_sync_status = 'syncing', last_error = NULL
       WHERE mailbox_id = ? AND current_sync_status != 'syncing'`,
      [mailboxId]
    );
    return (result.changes ?? 0) > 0;
  }

  async releaseSyncLock(mailboxId: string, status: 'idle' | 'error' = 'idle', error?: string): Promise<void> {
    await this.db.run(
      'UPDATE sync_cursors SET current_sync_status = ?, last_error = ? WHERE mailbox_id = ?',
      [status, error ?? null, mailboxId]
    );
  }

  /**
   * Clear locks left behind by a process that did not shut down cleanly
   */
  async releaseStaleLocks(): Promise<number> {
    const result = await this.db.run(
      `UPDATE sync_cursors SET current_sync_status = 'idle' WHERE current_sync_status = 'syncing'`
    );
    return result.changes ?? 0;
  }

  /**
   * Drop the cursor so the next pass does a windowed resync
   */
  async reset(mailboxId: string): Promise<void> {
    await this.writes.runExclusive(mailboxId, async () => {
      await this.db.run(
        'UPDATE sync_cursors SET cursor = NULL, cursor_at = NULL WHERE mailbox_id = ?',
        [mailboxId]
      );
    });
  }

  async getMailboxesWithErrors(): Promise<Array<{ mailboxId: string; lastError: string }>> {
    const rows = await this.db.all<{ mailbox_id: string; last_error: string }[]>(
      `SELECT mailbox_id, last_error FROM sync_cursors
       WHERE current_sync_status = 'error'
       AND last_error IS NOT NULL`
    );

    return (rows || []).map(row => ({
      mailboxId: row.mailbox_id,
      lastError: row.last_error
    }));
  }

  /**
   * Get sync statistics for monitoring
   */
  async getStatistics(): Promise<{
    totalMailboxes: number;
    mailboxesWithoutCursor: number;
    mailboxesSyncing: number;
    mailboxesWithErrors: number;
    totalProcessed: number;
  }> {
    const stats = await this.db.get<{
      total_mailboxes: number;
      without_cursor: number | null;
      currently_syncing: number | null;
      with_errors: number | null;
      total_processed: number | null;
    }>(
      `SELECT
        COUNT(*) as total_mailboxes,
        SUM(CASE WHEN cursor IS NULL THEN 1 ELSE 0 END) as without_cursor,
        SUM(CASE WHEN current_sync_status = 'syncing' THEN 1 ELSE 0 END) as currently_syncing,
        SUM(CASE WHEN current_sync_status = 'error' THEN 1 ELSE 0 END) as with_errors,
        SUM(total_processed) as total_processed
       FROM sync_cursors`
    );

    return {
      totalMailboxes: stats?.total_mailboxes || 0,
      mailboxesWithoutCursor: stats?.without_cursor || 0,
      mailboxesSyncing: stats?.currently_syncing || 0,
      mailboxesWithErrors: stats?.with_errors || 0,
      totalProcessed: stats?.total_processed || 0
    };
  }
}
