/**
 * Core data models for the complaint router
 */

export type KeywordCategory = 'complaint' | 'subject' | 'urgency' | 'negation';

export type SyncStatus = 'idle' | 'syncing' | 'error';

export type SentimentMode = 'gate' | 'additive' | 'off';

export type FeedbackKind = 'false_positive' | 'false_negative';

export type FeedbackSource = 'mailbox' | 'operator';

export interface Message {
  id: string; // Provider's unique message ID
  mailboxId: string;
  sender: string;
  subject: string;
  body: string; // Plain text, HTML already stripped
  recipients: string[];
  receivedAt: Date;
  metadata: {
    threadId?: string;
    labels: string[];
    htmlBody?: string;
  };
}

export interface KeywordSet {
  complaint: ReadonlySet<string>;
  subject: ReadonlySet<string>;
  urgency: ReadonlySet<string>;
  negation: ReadonlySet<string>;
}

export interface KeywordSnapshot {
  generation: number;
  keywords: KeywordSet;
  // Keyed by `${category}:${term}`
  adjustments: ReadonlyMap<string, number>;
}

export interface ScoringWeights {
  bodyKeyword: number;
  subjectKeyword: number;
  urgency: number;
  negation: number; // Usually negative
  sentiment: number; // Only used by the additive rule
  keywordThreshold: number;
  sentimentThreshold: number;
  sentimentBand: number;
  keywordSaturation: number;
  sentimentMode: SentimentMode;
  contextualCheck: {
    enabled: boolean;
    proximity: number;
    scoreThreshold: number;
    // Dampen a match like the negation keyword list does
    negativeWords: string[];
  };
}

export interface ExclusionRules {
  from: RegExp[];
  subject: RegExp[];
}

export interface SyncCursor {
  mailboxId: string;
  cursor: string | null; // null means "no prior state"
  cursorAt: Date | null;
  lastSyncAt: Date | null;
  totalProcessed: number;
  status: SyncStatus;
  lastError?: string;
}

export interface KeywordHit {
  term: string;
  category: Exclude<KeywordCategory, 'negation'>;
  index: number;
  factor: number; // Negation suppression factor, 1 = unaffected
  multiplier: number; // Learned feedback multiplier
}

export interface SentimentReading {
  score: number; // Probability the text is negative, [0,1]
  label: string;
  fallback: boolean;
}

export interface ClassificationSignals {
  bodyHits: KeywordHit[];
  subjectHits: KeywordHit[];
  urgencyHits: KeywordHit[];
  negatedHits: KeywordHit[];
  keywordConfidence: number;
  sentiment?: SentimentReading;
  sentimentContribution: number;
  rule: SentimentMode;
}

export interface ClassificationResult {
  messageId: string;
  mailboxId: string;
  confidence: number;
  isComplaint: boolean;
  excludedBy: 'from' | 'subject' | null;
  signals: ClassificationSignals;
  classifiedAt: Date;
}

export interface ClassificationRecord extends ClassificationResult {
  subject: string;
  sender: string;
  forwardedAt: Date | null;
}

export interface FeedbackSignal {
  id: string;
  mailboxId: string;
  messageId: string;
  kind: FeedbackKind;
  source: FeedbackSource;
  subject?: string;
  body?: string;
  receivedAt: Date;
  processedAt: Date | null;
}

export interface KeywordAdjustment {
  category: Exclude<KeywordCategory, 'negation'>;
  term: string;
  multiplier: number;
  updatedAt: Date;
}

export interface KeywordCandidate {
  term: string;
  occurrences: number;
  lastSeenAt: Date;
}

// Database row interfaces (for SQLite storage)
export interface SyncCursorRow {
  mailbox_id: string;
  cursor: string | null;
  cursor_at: string | null;
  last_sync_at: string | null;
  total_processed: number;
  current_sync_status: string;
  last_error: string | null;
}

export interface ClassificationRow {
  mailbox_id: string;
  message_id: string;
  subject: string;
  sender: string;
  confidence: number;
  is_complaint: number; // SQLite boolean as integer
  excluded_by: string | null;
  signals: string; // JSON string
  classified_at: string;
  forwarded_at: string | null;
}

export interface FeedbackSignalRow {
  id: string;
  mailbox_id: string;
  message_id: string;
  kind: string;
  source: string;
  subject: string | null;
  body: string | null;
  received_at: string;
  processed_at: string | null;
}

export interface KeywordAdjustmentRow {
  category: string;
  term: string;
  multiplier: number;
  updated_at: string;
}

export interface KeywordCandidateRow {
  term: string;
  occurrences: number;
  last_seen_at: string;
}
