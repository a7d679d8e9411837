import {
  ClassificationRecord, ClassificationRow, ClassificationSignals,
  FeedbackKind, FeedbackSignal, FeedbackSignalRow, FeedbackSource,
  KeywordAdjustment, KeywordAdjustmentRow, KeywordCandidate, KeywordCandidateRow,
  SyncCursor, SyncCursorRow, SyncStatus
} from '../types/models';
import { isValidSyncStatus } from './validation';

/**
 * Transformation functions between database rows and model objects
 */

function toDate(value: string | null): Date | null {
  return value ? new Date(value) : null;
}

// Sync cursor transformations
export function syncCursorRowToModel(row: SyncCursorRow): SyncCursor {
  const status: SyncStatus = isValidSyncStatus(row.current_sync_status) ? row.current_sync_status : 'idle';
  return {
    mailboxId: row.mailbox_id,
    cursor: row.cursor,
    cursorAt: toDate(row.cursor_at),
    lastSyncAt: toDate(row.last_sync_at),
    totalProcessed: row.total_processed,
    status,
    lastError: row.last_error ?? undefined
  };
}

// Classification transformations
export function classificationRowToModel(row: ClassificationRow): ClassificationRecord {
  const signals: ClassificationSignals = JSON.parse(row.signals);
  return {
    messageId: row.message_id,
    mailboxId: row.mailbox_id,
    subject: row.subject,
    sender: row.sender,
    confidence: row.confidence,
    isComplaint: Boolean(row.is_complaint),
    excludedBy: row.excluded_by === 'from' || row.excluded_by === 'subject' ? row.excluded_by : null,
    signals,
    classifiedAt: new Date(row.classified_at),
    forwardedAt: toDate(row.forwarded_at)
  };
}

export function classificationModelToRow(record: ClassificationRecord): ClassificationRow {
  return {
    mailbox_id: record.mailboxId,
    message_id: record.messageId,
    subject: record.subject,
    sender: record.sender,
    confidence: record.confidence,
    is_complaint: record.isComplaint ? 1 : 0,
    excluded_by: record.excludedBy,
    signals: JSON.stringify(record.signals),
    classified_at: record.classifiedAt.toISOString(),
    forwarded_at: record.forwardedAt ? record.forwardedAt.toISOString() : null
  };
}

// Feedback transformations
export function feedbackSignalRowToModel(row: FeedbackSignalRow): FeedbackSignal {
  const kind: FeedbackKind = row.kind === 'false_negative' ? 'false_negative' : 'false_positive';
  const source: FeedbackSource = row.source === 'operator' ? 'operator' : 'mailbox';
  return {
    id: row.id,
    mailboxId: row.mailbox_id,
    messageId: row.message_id,
    kind,
    source,
    subject: row.subject ?? undefined,
    body: row.body ?? undefined,
    receivedAt: new Date(row.received_at),
    processedAt: toDate(row.processed_at)
  };
}

export function feedbackSignalModelToRow(signal: FeedbackSignal): FeedbackSignalRow {
  return {
    id: signal.id,
    mailbox_id: signal.mailboxId,
    message_id: signal.messageId,
    kind: signal.kind,
    source: signal.source,
    subject: signal.subject ?? null,
    body: signal.body ?? null,
    received_at: signal.receivedAt.toISOString(),
    processed_at: signal.processedAt ? signal.processedAt.toISOString() : null
  };
}

export function keywordAdjustmentRowToModel(row: KeywordAdjustmentRow): KeywordAdjustment | null {
  if (row.category !== 'complaint' && row.category !== 'subject' && row.category !== 'urgency') {
    return null;
  }
  return {
    category: row.category,
    term: row.term,
    multiplier: row.multiplier,
    updatedAt: new Date(row.updated_at)
  };
}

export function keywordCandidateRowToModel(row: KeywordCandidateRow): KeywordCandidate {
  return {
    term: row.term,
    occurrences: row.occurrences,
    lastSeenAt: new Date(row.last_seen_at)
  };
}

export function adjustmentKey(category: string, term: string): string {
  return `${category}:${term}`;
}
