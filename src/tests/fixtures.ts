/**
 * Shared builders and in-process fakes for the test suite
 */

import { Database, open } from 'sqlite';
import sqlite3 from 'sqlite3';
import { runMigrations } from '../database/migrations';
import { CursorExpired, MessageNotFound } from '../models/errors';
import {
  KeywordCategory, KeywordSet, KeywordSnapshot, Message, ScoringWeights, SentimentReading
} from '../types/models';
import {
  ForwardRequest, MailProvider, MessageListing, RequestOptions, SearchFilter, WindowFilter
} from '../services/email/MailProvider';
import { SentimentScorer } from '../services/sentiment/SentimentAdapter';
import { throwIfAborted } from '../utils/retry';

export async function createTestDatabase(): Promise<Database> {
  const db = await open({
    filename: ':memory:',
    driver: sqlite3.Database
  });
  await runMigrations(db);
  return db;
}

export function makeWeights(overrides: Partial<ScoringWeights> = {}): ScoringWeights {
  return {
    bodyKeyword: 0.7,
    subjectKeyword: 0.2,
    urgency: 0.1,
    negation: -0.5,
    sentiment: 0.4,
    keywordThreshold: 0.2,
    sentimentThreshold: 0.7,
    sentimentBand: 0.1,
    keywordSaturation: 3,
    sentimentMode: 'off',
    contextualCheck: {
      enabled: true,
      proximity: 3,
      scoreThreshold: 0.25,
      negativeWords: []
    },
    ...overrides
  };
}

export function makeKeywords(terms: Partial<Record<KeywordCategory, string[]>> = {}): KeywordSet {
  return {
    complaint: new Set(terms.complaint ?? ['unhappy', 'outage', 'broken', 'refund']),
    subject: new Set(terms.subject ?? ['complaint']),
    urgency: new Set(terms.urgency ?? ['urgent']),
    negation: new Set(terms.negation ?? ['not', 'no', 'never'])
  };
}

export function makeSnapshot(
  keywords: KeywordSet = makeKeywords(),
  adjustments: Map<string, number> = new Map()
): KeywordSnapshot {
  return { generation: 1, keywords, adjustments };
}

let messageCounter = 0;

export function makeMessage(overrides: Partial<Message> = {}): Message {
  messageCounter++;
  return {
    id: `msg-${messageCounter}`,
    mailboxId: 'support@example.com',
    sender: 'customer@example.org',
    subject: 'Question',
    body: 'Hello there',
    recipients: ['support@example.com'],
    receivedAt: new Date(),
    metadata: { labels: ['INBOX'] },
    ...overrides
  };
}

/**
 * Returns a fixed reading (or throws a fixed error) and records the text it saw
 */
export class FakeSentiment implements SentimentScorer {
  calls: string[] = [];

  constructor(private outcome: SentimentReading | Error) {}

  static reading(score: number, fallback: boolean = false): FakeSentiment {
    return new FakeSentiment({ score, label: fallback ? 'UNAVAILABLE' : 'NEGATIVE', fallback });
  }

  setOutcome(outcome: SentimentReading | Error): void {
    this.outcome = outcome;
  }

  async score(text: string): Promise<SentimentReading> {
    this.calls.push(text);
    if (this.outcome instanceof Error) {
      throw this.outcome;
    }
    return this.outcome;
  }
}

interface StoredMessage {
  message: Message;
  historyId: number;
}

/**
 * In-memory mail provider. Every delivered message gets the next history
 * id, and cursors are the history id as a string. Forwards leave a SENT
 * copy behind that searches can see, as Gmail does.
 */
export class FakeMailProvider implements MailProvider {
  private inbox: StoredMessage[] = [];
  private searchable: Message[] = [];
  private historyId = 100;

  expiredCursors = new Set<string>();
  failingFetches = new Set<string>();
  vanished = new Set<string>();
  failListing: Error | null = null;
  failForward: Error | null = null;
  failDelete: Error | null = null;
  forwarded: Array<{ mailboxId: string; messageId: string; forward: ForwardRequest }> = [];
  deleted: Array<{ mailboxId: string; messageId: string }> = [];
  windowRequests: Array<{ mailboxId: string; filter: WindowFilter }> = [];
  searchRequests: Array<{ mailboxId: string; filter: SearchFilter }> = [];

  deliver(message: Message): void {
    this.historyId++;
    this.inbox.push({ message, historyId: this.historyId });
  }

  addSearchable(message: Message): void {
    this.searchable.push(message);
  }

  currentCursor(): string {
    return String(this.historyId);
  }

  async listChanges(mailboxId: string, cursor: string, options: RequestOptions = {}): Promise<MessageListing> {
    throwIfAborted(options.signal);
    if (this.failListing) throw this.failListing;
    if (this.expiredCursors.has(cursor)) {
      throw new CursorExpired(mailboxId, cursor);
    }

    const since = Number(cursor);
    return {
      messageIds: this.inbox
        .filter(entry => entry.message.mailboxId === mailboxId && entry.historyId > since)
        .map(entry => entry.message.id),
      nextCursor: this.currentCursor(),
      cursorAt: new Date()
    };
  }

  async listWindow(mailboxId: string, filter: WindowFilter, options: RequestOptions = {}): Promise<MessageListing> {
    throwIfAborted(options.signal);
    if (this.failListing) throw this.failListing;
    this.windowRequests.push({ mailboxId, filter });

    const matching = this.inbox
      .filter(entry => entry.message.mailboxId === mailboxId)
      .filter(entry => !filter.since || entry.message.receivedAt >= filter.since)
      .map(entry => entry.message.id);

    return {
      messageIds: matching.slice(-filter.limit),
      nextCursor: this.currentCursor(),
      cursorAt: new Date()
    };
  }

  async getMessage(mailboxId: string, messageId: string, options: RequestOptions = {}): Promise<Message> {
    throwIfAborted(options.signal);
    if (this.failingFetches.has(messageId)) {
      throw new Error(`fetch failed for ${messageId}`);
    }
    if (this.vanished.has(messageId)) {
      throw new MessageNotFound(mailboxId, messageId);
    }
    const entry = this.inbox.find(item => item.message.mailboxId === mailboxId && item.message.id === messageId);
    if (!entry) {
      throw new MessageNotFound(mailboxId, messageId);
    }
    return entry.message;
  }

  async searchMessages(mailboxId: string, filter: SearchFilter): Promise<Message[]> {
    this.searchRequests.push({ mailboxId, filter });
    return this.searchable
      .filter(message => message.mailboxId === mailboxId)
      .filter(message => message.receivedAt >= filter.since)
      .filter(message => !filter.containing || message.body.includes(filter.containing))
      .filter(message => !filter.sentTo || message.recipients.includes(filter.sentTo))
      .filter(message => !filter.receivedOnly ||
        (message.metadata.labels.includes('INBOX') && message.sender !== mailboxId))
      .slice(0, filter.limit);
  }

  async forwardMessage(mailboxId: string, message: Message, forward: ForwardRequest): Promise<void> {
    if (this.failForward) throw this.failForward;
    this.forwarded.push({ mailboxId, messageId: message.id, forward });
    this.searchable.push({
      id: `sent-${this.forwarded.length}`,
      mailboxId,
      sender: mailboxId,
      subject: forward.subject,
      body: forward.text,
      recipients: [forward.to],
      receivedAt: new Date(),
      metadata: { labels: ['SENT'] }
    });
  }

  async deleteMessage(mailboxId: string, messageId: string): Promise<void> {
    if (this.failDelete) throw this.failDelete;
    this.deleted.push({ mailboxId, messageId });
  }
}
