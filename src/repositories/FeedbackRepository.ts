import { Database } from 'sqlite';
import { v4 as uuidv4 } from 'uuid';
import {
  FeedbackKind, FeedbackSignal, FeedbackSignalRow, KeywordAdjustment,
  KeywordAdjustmentRow, KeywordCandidate, KeywordCandidateRow
} from '../types/models';
import {
  adjustmentKey, feedbackSignalModelToRow, feedbackSignalRowToModel,
  keywordAdjustmentRowToModel, keywordCandidateRowToModel
} from '../models/transformers';
import { getDatabase } from '../config/database';

export type NewFeedbackSignal = Omit<FeedbackSignal, 'id' | 'receivedAt' | 'processedAt'>;

/**
 * FeedbackRepository holds false positive/negative signals and the
 * keyword multipliers learned from them
 */
export class FeedbackRepository {
  constructor(private db: Database | null = null) {}

  private async getDb(): Promise<Database> {
    if (!this.db) {
      this.db = await getDatabase();
    }
    return this.db;
  }

  /**
   * Returns the stored signal, or null when the same (kind, mailbox, message)
   * was already recorded
   */
  async recordSignal(input: NewFeedbackSignal): Promise<FeedbackSignal | null> {
    const db = await this.getDb();
    const signal: FeedbackSignal = {
      ...input,
      id: uuidv4(),
      receivedAt: new Date(),
      processedAt: null
    };
    const row = feedbackSignalModelToRow(signal);

    const result = await db.run(
      `INSERT OR IGNORE INTO feedback_signals (
        id, mailbox_id, message_id, kind, source, subject, body, received_at, processed_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [row.id, row.mailbox_id, row.message_id, row.kind, row.source, row.subject, row.body, row.received_at, row.processed_at]
    );

    return (result.changes ?? 0) > 0 ? signal : null;
  }

  async pendingSignals(kind: FeedbackKind, limit: number = 100): Promise<FeedbackSignal[]> {
    const db = await this.getDb();
    const rows = await db.all<FeedbackSignalRow[]>(
      `SELECT * FROM feedback_signals
       WHERE kind = ? AND processed_at IS NULL
       ORDER BY received_at ASC
       LIMIT ?`,
      [kind, limit]
    );
    return (rows || []).map(feedbackSignalRowToModel);
  }

  async markProcessed(id: string, at: Date = new Date()): Promise<void> {
    const db = await this.getDb();
    await db.run('UPDATE feedback_signals SET processed_at = ? WHERE id = ?', [at.toISOString(), id]);
  }

  async countPending(): Promise<Record<FeedbackKind, number>> {
    const db = await this.getDb();
    const rows = await db.all<{ kind: string; pending: number }[]>(
      `SELECT kind, COUNT(*) as pending FROM feedback_signals
       WHERE processed_at IS NULL GROUP BY kind`
    );

    const counts: Record<FeedbackKind, number> = { false_positive: 0, false_negative: 0 };
    for (const row of rows || []) {
      if (row.kind === 'false_positive' || row.kind === 'false_negative') {
        counts[row.kind] = row.pending;
      }
    }
    return counts;
  }

  /**
   * Learned multipliers keyed by `${category}:${term}`
   */
  async loadAdjustments(): Promise<Map<string, number>> {
    const db = await this.getDb();
    const rows = await db.all<KeywordAdjustmentRow[]>('SELECT * FROM keyword_adjustments');

    const adjustments = new Map<string, number>();
    for (const row of rows || []) {
      const adjustment = keywordAdjustmentRowToModel(row);
      if (adjustment) {
        adjustments.set(adjustmentKey(adjustment.category, adjustment.term), adjustment.multiplier);
      }
    }
    return adjustments;
  }

  async listAdjustments(): Promise<KeywordAdjustment[]> {
    const db = await this.getDb();
    const rows = await db.all<KeywordAdjustmentRow[]>(
      'SELECT * FROM keyword_adjustments ORDER BY category, term'
    );

    const adjustments: KeywordAdjustment[] = [];
    for (const row of rows || []) {
      const adjustment = keywordAdjustmentRowToModel(row);
      if (adjustment) adjustments.push(adjustment);
    }
    return adjustments;
  }

  async saveAdjustments(adjustments: KeywordAdjustment[]): Promise<void> {
    const db = await this.getDb();
    for (const adjustment of adjustments) {
      await db.run(
        `INSERT INTO keyword_adjustments (category, term, multiplier, updated_at)
         VALUES (?, ?, ?, ?)
         ON CONFLICT(category, term) DO UPDATE SET
           multiplier = excluded.multiplier,
           updated_at = excluded.updated_at`,
        [adjustment.category, adjustment.term, adjustment.multiplier, adjustment.updatedAt.toISOString()]
      );
    }
  }

  async recordCandidates(terms: string[], at: Date = new Date()): Promise<void> {
    const db = await this.getDb();
    for (const term of terms) {
      await db.run(
        `INSERT INTO keyword_candidates (term, occurrences, last_seen_at)
         VALUES (?, 1, ?)
         ON CONFLICT(term) DO UPDATE SET
           occurrences = keyword_candidates.occurrences + 1,
           last_seen_at = excluded.last_seen_at`,
        [term, at.toISOString()]
      );
    }
  }

  async topCandidates(limit: number = 20): Promise<KeywordCandidate[]> {
    const db = await this.getDb();
    const rows = await db.all<KeywordCandidateRow[]>(
      'SELECT * FROM keyword_candidates ORDER BY occurrences DESC, term ASC LIMIT ?',
      [limit]
    );
    return (rows || []).map(keywordCandidateRowToModel);
  }

  async getCheckpoint(kind: FeedbackKind, mailboxId: string): Promise<Date | null> {
    const db = await this.getDb();
    const row = await db.get<{ checked_at: string }>(
      'SELECT checked_at FROM feedback_checkpoints WHERE kind = ? AND mailbox_id = ?',
      [kind, mailboxId]
    );
    return row ? new Date(row.checked_at) : null;
  }

  async setCheckpoint(kind: FeedbackKind, mailboxId: string, checkedAt: Date): Promise<void> {
    const db = await this.getDb();
    await db.run(
      `INSERT INTO feedback_checkpoints (kind, mailbox_id, checked_at) VALUES (?, ?, ?)
       ON CONFLICT(kind, mailbox_id) DO UPDATE SET checked_at = excluded.checked_at`,
      [kind, mailboxId, checkedAt.toISOString()]
    );
  }
}
