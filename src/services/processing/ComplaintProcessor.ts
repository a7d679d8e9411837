import { OperationAborted, errorMessage } from '../../models/errors';
import { ClassificationResult, Message } from '../../types/models';
import { ClassificationRepository } from '../../repositories/ClassificationRepository';
import { KeywordStore } from '../keywords/KeywordStore';
import { ForwardRequest, MailProvider } from '../email/MailProvider';
import { ScoringEngine } from '../scoring/ScoringEngine';
import { CursorStore } from '../sync/CursorStore';
import { SyncCursorManager, SyncMode } from '../sync/SyncCursorManager';

export const PROCESSING_MARKER_PREFIX = 'X-Complaint-Processor: Processed-v1.0;';

const MARKER_PATTERN = /X-Complaint-Processor: Processed-v1\.0; ID=([^;\s]+);/;

export function processingMarker(messageId: string): string {
  return `${PROCESSING_MARKER_PREFIX} ID=${messageId};`;
}

/**
 * ID of the original message if the text carries our processing marker
 */
export function extractMarkedId(text: string): string | null {
  const match = text.match(MARKER_PATTERN);
  return match ? match[1] : null;
}

export type MessageOutcome = 'duplicate' | 'feedback' | 'excluded' | 'not_complaint' | 'forwarded';

export interface MailboxPassResult {
  mailboxId: string;
  mode: SyncMode | 'skipped';
  processed: number;
  complaints: number;
  forwarded: number;
  skipped: number;
  failed: number;
  committed: boolean;
  errors: string[];
}

export interface ProcessorOptions {
  distributionListEmail: string;
  deleteOriginal: boolean;
  requireContiguousProgress: boolean;
}

/**
 * ComplaintProcessor runs one sync pass per mailbox: fetch new messages,
 * classify, forward complaints, then advance the cursor
 */
export class ComplaintProcessor {
  constructor(
    private syncManager: SyncCursorManager,
    private cursors: CursorStore,
    private provider: MailProvider,
    private engine: ScoringEngine,
    private keywordStore: KeywordStore,
    private classifications: ClassificationRepository,
    private options: ProcessorOptions
  ) {}

  private debugLog(message: string, ...args: unknown[]) {
    if (process.env.COMPLAINT_DEBUG === 'true') {
      console.log(`[MAIN DEBUG] ${message}`, ...args);
    }
  }

  async processMailbox(mailboxId: string, signal?: AbortSignal): Promise<MailboxPassResult> {
    const result: MailboxPassResult = {
      mailboxId,
      mode: 'skipped',
      processed: 0,
      complaints: 0,
      forwarded: 0,
      skipped: 0,
      failed: 0,
      committed: false,
      errors: []
    };

    if (!(await this.cursors.tryAcquireSyncLock(mailboxId))) {
      console.log(`⏭️ [MAIN] ${mailboxId} is already being processed, skipping`);
      return result;
    }

    let status: 'idle' | 'error' = 'idle';
    let lastError: string | undefined;

    try {
      const batch = await this.syncManager.nextBatch(mailboxId, signal);
      result.mode = batch.mode;

      for await (const message of batch.messages()) {
        try {
          const outcome = await this.processMessage(message, signal);
          result.processed++;
          if (outcome === 'duplicate' || outcome === 'feedback') result.skipped++;
          if (outcome === 'forwarded') {
            result.complaints++;
            result.forwarded++;
          }
        } catch (error) {
          if (error instanceof OperationAborted) throw error;

          const errorMsg = `Failed to process message ${message.id}: ${errorMessage(error)}`;
          console.error(`❌ [MAIN] ${errorMsg}`);
          result.failed++;
          result.errors.push(errorMsg);
        }
      }

      result.failed += batch.failedMessageIds.length;
      result.errors.push(...batch.failedMessageIds.map(id => `Failed to fetch message ${id}`));

      if (result.failed > 0 && this.options.requireContiguousProgress) {
        console.warn(`⚠️ [SYNC] ${mailboxId}: ${result.failed} messages failed, cursor not advanced`);
      } else {
        const cursor = await batch.commit(result.processed);
        result.committed = true;
        this.debugLog(`${mailboxId} cursor advanced to ${cursor.cursor}`);
      }

      console.log(`✅ [MAIN] ${mailboxId} (${batch.mode}): ${result.processed} processed, ${result.forwarded} forwarded, ${result.skipped} skipped, ${result.failed} failed`);
    } catch (error) {
      if (error instanceof OperationAborted) {
        console.warn(`⚠️ [MAIN] Pass for ${mailboxId} interrupted: ${error.message}`);
        result.errors.push(error.message);
      } else {
        lastError = `Sync failed for ${mailboxId}: ${errorMessage(error)}`;
        console.error(`❌ [MAIN] ${lastError}`);
        result.errors.push(lastError);
        status = 'error';
      }
    } finally {
      await this.cursors.releaseSyncLock(mailboxId, status, lastError);
    }

    return result;
  }

  /**
   * Classify one message and forward it when it is a complaint. A message
   * that was already forwarded is left alone, and so is one of our own
   * forwards returned to the mailbox as feedback.
   */
  async processMessage(message: Message, signal?: AbortSignal): Promise<MessageOutcome> {
    const markedId = extractMarkedId(message.body);
    if (markedId) {
      this.debugLog(`${message.id} is a returned forward of ${markedId}`);
      return 'feedback';
    }

    const existing = await this.classifications.get(message.mailboxId, message.id);
    if (existing?.forwardedAt) {
      this.debugLog(`${message.id} already forwarded at ${existing.forwardedAt.toISOString()}`);
      return 'duplicate';
    }

    const classification = await this.engine.classify(message, this.keywordStore.current(), signal);
    await this.classifications.save({
      ...classification,
      subject: message.subject,
      sender: message.sender,
      forwardedAt: null
    });

    if (classification.excludedBy) {
      return 'excluded';
    }
    if (!classification.isComplaint) {
      this.debugLog(`${message.id} is not a complaint (${classification.confidence.toFixed(3)})`);
      return 'not_complaint';
    }

    await this.forward(message, classification, signal);
    return 'forwarded';
  }

  private async forward(message: Message, classification: ClassificationResult, signal?: AbortSignal): Promise<void> {
    const { mailboxId } = message;
    await this.provider.forwardMessage(mailboxId, message, buildForward(message, this.options.distributionListEmail), { signal });
    await this.classifications.markForwarded(mailboxId, message.id);
    console.log(`📧 [MAIN] Complaint ${message.id} (${classification.confidence.toFixed(3)}) forwarded to ${this.options.distributionListEmail}`);

    if (this.options.deleteOriginal) {
      try {
        await this.provider.deleteMessage(mailboxId, message.id, { signal });
      } catch (error) {
        if (error instanceof OperationAborted) throw error;
        // Already forwarded and recorded, so the message will not be sent again
        console.error(`❌ [MAIN] Could not delete ${message.id} from ${mailboxId}: ${errorMessage(error)}`);
      }
    }
  }
}

export function buildForward(message: Message, to: string): ForwardRequest {
  const marker = processingMarker(message.id);
  return {
    to,
    subject: `FW: ${message.subject}`,
    text: `${marker}\n\n${message.body}`,
    html: message.metadata.htmlBody ? `<p>${marker}</p>${message.metadata.htmlBody}` : undefined,
    headers: { 'X-Complaint-Processor': `Processed-v1.0; ID=${message.id}` }
  };
}
