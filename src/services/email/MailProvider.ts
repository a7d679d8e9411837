import { Message } from '../../types/models';

export interface RequestOptions {
  signal?: AbortSignal;
}

/**
 * Message IDs returned by a listing, plus the cursor that resumes after it
 */
export interface MessageListing {
  messageIds: string[];
  nextCursor: string;
  cursorAt: Date;
}

export interface WindowFilter {
  since: Date | null;
  limit: number;
}

export interface SearchFilter {
  since: Date;
  limit: number;
  containing?: string;
  sentTo?: string;
  // Inbox mail from someone else; leaves out sent copies of our own forwards
  receivedOnly?: boolean;
}

export interface ForwardRequest {
  to: string;
  subject: string;
  text: string;
  html?: string;
  headers?: Record<string, string>;
}

/**
 * Mail provider operations the processor depends on. Implementations
 * throw CursorExpired when a delta cursor is rejected, MessageNotFound
 * for a message that no longer exists and TransientProviderError for
 * failures worth retrying.
 */
export interface MailProvider {
  listChanges(mailboxId: string, cursor: string, options?: RequestOptions): Promise<MessageListing>;
  listWindow(mailboxId: string, filter: WindowFilter, options?: RequestOptions): Promise<MessageListing>;
  getMessage(mailboxId: string, messageId: string, options?: RequestOptions): Promise<Message>;
  searchMessages(mailboxId: string, filter: SearchFilter, options?: RequestOptions): Promise<Message[]>;
  forwardMessage(mailboxId: string, message: Message, forward: ForwardRequest, options?: RequestOptions): Promise<void>;
  deleteMessage(mailboxId: string, messageId: string, options?: RequestOptions): Promise<void>;
}
