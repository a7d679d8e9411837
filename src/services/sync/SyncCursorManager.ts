import { CursorExpired, MessageNotFound, OperationAborted, errorMessage } from '../../models/errors';
import { Message, SyncCursor } from '../../types/models';
import { throwIfAborted } from '../../utils/retry';
import { MailProvider, MessageListing } from '../email/MailProvider';
import { CursorStore } from './CursorStore';

export type SyncMode = 'delta' | 'full';

/**
 * One unit of work for a mailbox. Messages are fetched lazily while
 * iterating; the cursor only moves when `commit` is called.
 */
export interface SyncBatch {
  mailboxId: string;
  mode: SyncMode;
  size: number;
  // IDs whose fetch failed during iteration
  failedMessageIds: string[];
  messages(): AsyncGenerator<Message>;
  commit(processed: number): Promise<SyncCursor>;
}

export interface SyncCursorOptions {
  topEmails: number;
  startDate: Date | null;
}

/**
 * Turns the stored cursor into the next batch of new messages, falling
 * back to a bounded windowed fetch when there is no cursor or the
 * provider has expired it.
 */
export class SyncCursorManager {
  constructor(
    private provider: MailProvider,
    private cursors: CursorStore,
    private options: SyncCursorOptions
  ) {}

  async nextBatch(mailboxId: string, signal?: AbortSignal): Promise<SyncBatch> {
    throwIfAborted(signal);
    const state = await this.cursors.ensure(mailboxId);

    let listing: MessageListing | null = null;
    let mode: SyncMode = 'delta';

    if (state.cursor) {
      try {
        listing = await this.provider.listChanges(mailboxId, state.cursor, { signal });
      } catch (error) {
        if (!(error instanceof CursorExpired)) {
          throw error;
        }
        console.warn(`⚠️ Cursor for ${mailboxId} expired, falling back to windowed fetch`);
      }
    }

    if (!listing) {
      mode = 'full';
      listing = await this.provider.listWindow(
        mailboxId,
        { since: this.windowStart(state), limit: this.options.topEmails },
        { signal }
      );
    }

    console.log(`📧 ${mailboxId}: ${listing.messageIds.length} new messages (${mode})`);
    return this.createBatch(mailboxId, mode, listing, signal);
  }

  private windowStart(state: SyncCursor): Date | null {
    const { startDate } = this.options;
    if (state.cursorAt && startDate) {
      return state.cursorAt > startDate ? state.cursorAt : startDate;
    }
    return state.cursorAt ?? startDate;
  }

  private createBatch(
    mailboxId: string,
    mode: SyncMode,
    listing: MessageListing,
    signal?: AbortSignal
  ): SyncBatch {
    const provider = this.provider;
    const cursors = this.cursors;
    const failedMessageIds: string[] = [];
    let committed = false;

    return {
      mailboxId,
      mode,
      size: listing.messageIds.length,
      failedMessageIds,
      async *messages() {
        for (const messageId of listing.messageIds) {
          throwIfAborted(signal);
          try {
            yield await provider.getMessage(mailboxId, messageId, { signal });
          } catch (error) {
            if (error instanceof OperationAborted) throw error;
            if (error instanceof MessageNotFound) {
              console.log(`⏭️ ${error.message}`);
              continue;
            }
            console.error(`❌ Failed to fetch message ${messageId} from ${mailboxId}: ${errorMessage(error)}`);
            failedMessageIds.push(messageId);
          }
        }
      },
      async commit(processed: number) {
        if (committed) {
          throw new Error(`Batch for ${mailboxId} was already committed`);
        }
        const cursor = await cursors.advance(mailboxId, listing.nextCursor, listing.cursorAt, {
          resync: mode === 'full',
          processed
        });
        committed = true;
        return cursor;
      }
    };
  }
}
