import { FeedbackSettings } from '../../config/settings';
import { OperationAborted, errorMessage } from '../../models/errors';
import { adjustmentKey } from '../../models/transformers';
import { FeedbackRepository } from '../../repositories/FeedbackRepository';
import { ClassificationRepository } from '../../repositories/ClassificationRepository';
import {
  ClassificationSignals, FeedbackKind, FeedbackSignal, KeywordAdjustment,
  KeywordHit, KeywordSnapshot, Message
} from '../../types/models';
import { MailProvider } from '../email/MailProvider';
import { KeywordStore } from '../keywords/KeywordStore';
import { PROCESSING_MARKER_PREFIX, extractMarkedId } from '../processing/ComplaintProcessor';
import { ScoringEngine } from '../scoring/ScoringEngine';
import { tokenize } from '../scoring/Tokenizer';
import { KeyedMutex } from '../../utils/KeyedMutex';
import stopWordList from './stopwords.json';

const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);
const MIN_CANDIDATE_LENGTH = 4;

export interface FeedbackLoopOptions extends FeedbackSettings {
  mailboxes: string[];
  distributionListEmail: string;
  topEmails: number;
}

export interface FeedbackPassResult {
  kind: FeedbackKind;
  collected: number;
  processed: number;
  adjusted: number;
  candidates: number;
  errors: string[];
}

type TermRef = Pick<KeywordHit, 'category' | 'term'>;

const ADJUSTMENT_LOCK = 'keyword-adjustments';

/**
 * Tokens from a missed complaint that could become new keywords
 */
export function extractCandidates(text: string, snapshot: KeywordSnapshot, limit: number): string[] {
  if (limit <= 0) return [];

  const { keywords } = snapshot;
  const counts = new Map<string, number>();
  for (const token of tokenize(text)) {
    if (token.length < MIN_CANDIDATE_LENGTH || /^\d+$/.test(token)) continue;
    if (STOP_WORDS.has(token)) continue;
    if (keywords.complaint.has(token) || keywords.subject.has(token) ||
        keywords.urgency.has(token) || keywords.negation.has(token)) continue;

    counts.set(token, (counts.get(token) ?? 0) + 1);
  }

  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
    .slice(0, limit)
    .map(([term]) => term);
}

/**
 * FeedbackLoop collects false positive and false negative signals and
 * turns them into per-term multiplier adjustments
 */
export class FeedbackLoop {
  private adjustmentLock = new KeyedMutex();

  constructor(
    private provider: MailProvider,
    private classifications: ClassificationRepository,
    private feedback: FeedbackRepository,
    private keywordStore: KeywordStore,
    private engine: ScoringEngine,
    private options: FeedbackLoopOptions
  ) {}

  async run(kind: FeedbackKind, signal?: AbortSignal): Promise<FeedbackPassResult> {
    const tag = kind === 'false_positive' ? '[FP]' : '[FN]';
    const result: FeedbackPassResult = { kind, collected: 0, processed: 0, adjusted: 0, candidates: 0, errors: [] };

    for (const mailboxId of this.options.mailboxes) {
      try {
        result.collected += await this.collect(kind, mailboxId, signal);
      } catch (error) {
        if (error instanceof OperationAborted) throw error;
        const errorMsg = `Feedback collection failed for ${mailboxId}: ${errorMessage(error)}`;
        console.error(`❌ ${tag} ${errorMsg}`);
        result.errors.push(errorMsg);
      }
    }

    const processed = await this.processPending(kind);
    result.processed = processed.processed;
    result.adjusted = processed.adjusted;
    result.candidates = processed.candidates;

    if (result.collected > 0 || result.processed > 0) {
      console.log(`✅ ${tag} ${result.collected} collected, ${result.processed} processed, ${result.adjusted} multipliers adjusted`);
    }
    return result;
  }

  /**
   * Scans one mailbox for new feedback messages since the last check
   */
  async collect(kind: FeedbackKind, mailboxId: string, signal?: AbortSignal): Promise<number> {
    const checkStartedAt = new Date();
    const since = (await this.feedback.getCheckpoint(kind, mailboxId))
      ?? new Date(checkStartedAt.getTime() - this.options.lookbackMs);

    const messages = await this.provider.searchMessages(
      mailboxId,
      kind === 'false_positive'
        ? { since, limit: this.options.topEmails, containing: PROCESSING_MARKER_PREFIX, receivedOnly: true }
        : { since, limit: this.options.topEmails, sentTo: this.options.distributionListEmail, receivedOnly: true },
      { signal }
    );

    let collected = 0;
    for (const message of messages) {
      const recorded = kind === 'false_positive'
        ? await this.recordFalsePositive(message)
        : await this.recordFalseNegative(message);
      if (recorded) collected++;
    }

    await this.feedback.setCheckpoint(kind, mailboxId, checkStartedAt);
    return collected;
  }

  private async recordFalsePositive(message: Message): Promise<boolean> {
    const originalId = extractMarkedId(message.body);
    if (!originalId) return false;

    const signal = await this.feedback.recordSignal({
      mailboxId: message.mailboxId,
      messageId: originalId,
      kind: 'false_positive',
      source: 'mailbox'
    });
    return signal !== null;
  }

  private async recordFalseNegative(message: Message): Promise<boolean> {
    // Our own forwards are not misses
    if (extractMarkedId(message.body)) return false;

    const signal = await this.feedback.recordSignal({
      mailboxId: message.mailboxId,
      messageId: message.id,
      kind: 'false_negative',
      source: 'mailbox',
      subject: message.subject,
      body: message.body
    });
    return signal !== null;
  }

  async processPending(kind: FeedbackKind): Promise<{ processed: number; adjusted: number; candidates: number }> {
    // FP and FN passes both read and replace the multipliers; one at a time
    return this.adjustmentLock.runExclusive(ADJUSTMENT_LOCK, () => this.applyPending(kind));
  }

  private async applyPending(kind: FeedbackKind): Promise<{ processed: number; adjusted: number; candidates: number }> {
    const pending = await this.feedback.pendingSignals(kind);
    if (pending.length === 0) {
      return { processed: 0, adjusted: 0, candidates: 0 };
    }

    const snapshot = this.keywordStore.current();
    const multipliers = new Map(snapshot.adjustments);
    const changed = new Map<string, KeywordAdjustment>();
    let candidates = 0;

    for (const signal of pending) {
      const terms = kind === 'false_positive'
        ? await this.falsePositiveTerms(signal)
        : await this.falseNegativeTerms(signal, snapshot);

      if (terms && terms.length > 0) {
        this.adjust(terms, kind === 'false_positive' ? -this.options.step : this.options.step, multipliers, changed);
      } else if (terms && kind === 'false_negative') {
        const found = extractCandidates(`${signal.subject ?? ''} ${signal.body ?? ''}`, snapshot, this.options.candidateLimit);
        if (found.length > 0) {
          await this.feedback.recordCandidates(found);
          candidates += found.length;
          console.log(`📧 [FN] Candidate keywords from ${signal.messageId}: ${found.join(', ')}`);
        }
      }

      await this.feedback.markProcessed(signal.id);
    }

    if (changed.size > 0) {
      await this.feedback.saveAdjustments([...changed.values()]);
      const next = this.keywordStore.applyAdjustments(
        new Map([...changed.entries()].map(([key, adjustment]) => [key, adjustment.multiplier]))
      );
      console.log(`🔄 Keyword multipliers updated (${changed.size} terms, generation ${next.generation})`);
    }

    return { processed: pending.length, adjusted: changed.size, candidates };
  }

  // null when the signal does not apply to anything we classified
  private async falsePositiveTerms(signal: FeedbackSignal): Promise<TermRef[] | null> {
    const record = (await this.classifications.get(signal.mailboxId, signal.messageId))
      ?? (await this.classifications.findByMessageId(signal.messageId));

    if (!record || !record.forwardedAt) {
      console.log(`⏭️ [FP] No forwarded record for ${signal.messageId}, ignoring`);
      return null;
    }
    return firedTerms(record.signals, false);
  }

  private async falseNegativeTerms(signal: FeedbackSignal, snapshot: KeywordSnapshot): Promise<TermRef[] | null> {
    const record = await this.classifications.get(signal.mailboxId, signal.messageId);
    if (record?.forwardedAt) {
      console.log(`⏭️ [FN] ${signal.messageId} was forwarded, not a miss`);
      return null;
    }
    if (record) {
      return firedTerms(record.signals, true);
    }
    if (signal.subject === undefined && signal.body === undefined) {
      console.log(`⏭️ [FN] No record or text for ${signal.messageId}, ignoring`);
      return null;
    }

    const analysis = this.engine.analyzeKeywords(signal.subject ?? '', signal.body ?? '', snapshot);
    return firedTerms(analysis, true);
  }

  private adjust(
    terms: TermRef[],
    delta: number,
    multipliers: Map<string, number>,
    changed: Map<string, KeywordAdjustment>
  ): void {
    const seen = new Set<string>();
    for (const { category, term } of terms) {
      const key = adjustmentKey(category, term);
      if (seen.has(key)) continue;
      seen.add(key);

      const current = multipliers.get(key) ?? 1;
      const next = clamp(roundMultiplier(current + delta), this.options.minMultiplier, this.options.maxMultiplier);
      multipliers.set(key, next);
      changed.set(key, { category, term, multiplier: next, updatedAt: new Date() });
    }
  }
}

function firedTerms(
  signals: Pick<ClassificationSignals, 'bodyHits' | 'subjectHits' | 'urgencyHits' | 'negatedHits'>,
  includeNegated: boolean
): TermRef[] {
  const hits = [...signals.bodyHits, ...signals.subjectHits, ...signals.urgencyHits];
  if (includeNegated) hits.push(...signals.negatedHits);
  return hits.map(hit => ({ category: hit.category, term: hit.term }));
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

// Keeps repeated steps from accumulating float noise
function roundMultiplier(value: number): number {
  return Math.round(value * 1000) / 1000;
}
