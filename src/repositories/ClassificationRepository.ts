import { Database } from 'sqlite';
import { ClassificationRecord, ClassificationRow } from '../types/models';
import { classificationModelToRow, classificationRowToModel } from '../models/transformers';
import { getDatabase } from '../config/database';

/**
 * ClassificationRepository stores one decision per (mailbox, message).
 * The forwarded_at column is what makes reprocessing a batch safe.
 */
export class ClassificationRepository {
  constructor(private db: Database | null = null) {}

  private async getDb(): Promise<Database> {
    if (!this.db) {
      this.db = await getDatabase();
    }
    return this.db;
  }

  async get(mailboxId: string, messageId: string): Promise<ClassificationRecord | null> {
    const db = await this.getDb();
    const row = await db.get<ClassificationRow>(
      'SELECT * FROM classifications WHERE mailbox_id = ? AND message_id = ?',
      [mailboxId, messageId]
    );
    return row ? classificationRowToModel(row) : null;
  }

  /**
   * Most recent record for a message ID in any mailbox
   */
  async findByMessageId(messageId: string): Promise<ClassificationRecord | null> {
    const db = await this.getDb();
    const row = await db.get<ClassificationRow>(
      'SELECT * FROM classifications WHERE message_id = ? ORDER BY classified_at DESC LIMIT 1',
      [messageId]
    );
    return row ? classificationRowToModel(row) : null;
  }

  /**
   * Insert or replace the decision. An existing forwarded_at is never cleared.
   */
  async save(record: ClassificationRecord): Promise<void> {
    const db = await this.getDb();
    const row = classificationModelToRow(record);

    await db.run(
      `INSERT INTO classifications (
        mailbox_id, message_id, subject, sender, confidence, is_complaint,
        excluded_by, signals, classified_at, forwarded_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(mailbox_id, message_id) DO UPDATE SET
        subject = excluded.subject,
        sender = excluded.sender,
        confidence = excluded.confidence,
        is_complaint = excluded.is_complaint,
        excluded_by = excluded.excluded_by,
        signals = excluded.signals,
        classified_at = excluded.classified_at,
        forwarded_at = COALESCE(classifications.forwarded_at, excluded.forwarded_at)`,
      [
        row.mailbox_id,
        row.message_id,
        row.subject,
        row.sender,
        row.confidence,
        row.is_complaint,
        row.excluded_by,
        row.signals,
        row.classified_at,
        row.forwarded_at
      ]
    );
  }

  async markForwarded(mailboxId: string, messageId: string, at: Date = new Date()): Promise<void> {
    const db = await this.getDb();
    await db.run(
      'UPDATE classifications SET forwarded_at = ? WHERE mailbox_id = ? AND message_id = ? AND forwarded_at IS NULL',
      [at.toISOString(), mailboxId, messageId]
    );
  }

  async countSince(since: Date): Promise<{ classified: number; complaints: number; forwarded: number }> {
    const db = await this.getDb();
    const stats = await db.get<{ classified: number; complaints: number | null; forwarded: number | null }>(
      `SELECT
        COUNT(*) as classified,
        SUM(is_complaint) as complaints,
        SUM(CASE WHEN forwarded_at IS NOT NULL THEN 1 ELSE 0 END) as forwarded
       FROM classifications WHERE classified_at >= ?`,
      [since.toISOString()]
    );

    return {
      classified: stats?.classified || 0,
      complaints: stats?.complaints || 0,
      forwarded: stats?.forwarded || 0
    };
  }
}
