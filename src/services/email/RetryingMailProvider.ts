import { TransientProviderError, errorMessage } from '../../models/errors';
import { Message } from '../../types/models';
import { RetryPolicy, withRetry } from '../../utils/retry';
import {
  ForwardRequest, MailProvider, MessageListing, RequestOptions, SearchFilter, WindowFilter
} from './MailProvider';

/**
 * Applies the provider retry policy to every call. Only
 * TransientProviderError is retried; everything else surfaces at once.
 */
export class RetryingMailProvider implements MailProvider {
  constructor(private inner: MailProvider, private policy: RetryPolicy) {}

  listChanges(mailboxId: string, cursor: string, options: RequestOptions = {}): Promise<MessageListing> {
    return this.retry(`listChanges(${mailboxId})`, options, () => this.inner.listChanges(mailboxId, cursor, options));
  }

  listWindow(mailboxId: string, filter: WindowFilter, options: RequestOptions = {}): Promise<MessageListing> {
    return this.retry(`listWindow(${mailboxId})`, options, () => this.inner.listWindow(mailboxId, filter, options));
  }

  getMessage(mailboxId: string, messageId: string, options: RequestOptions = {}): Promise<Message> {
    return this.retry(`getMessage(${messageId})`, options, () => this.inner.getMessage(mailboxId, messageId, options));
  }

  searchMessages(mailboxId: string, filter: SearchFilter, options: RequestOptions = {}): Promise<Message[]> {
    return this.retry(`searchMessages(${mailboxId})`, options, () => this.inner.searchMessages(mailboxId, filter, options));
  }

  forwardMessage(mailboxId: string, message: Message, forward: ForwardRequest, options: RequestOptions = {}): Promise<void> {
    return this.retry(`forwardMessage(${message.id})`, options, () => this.inner.forwardMessage(mailboxId, message, forward, options));
  }

  deleteMessage(mailboxId: string, messageId: string, options: RequestOptions = {}): Promise<void> {
    return this.retry(`deleteMessage(${messageId})`, options, () => this.inner.deleteMessage(mailboxId, messageId, options));
  }

  private retry<T>(label: string, options: RequestOptions, operation: () => Promise<T>): Promise<T> {
    return withRetry(operation, this.policy, {
      signal: options.signal,
      isRetryable: error => error instanceof TransientProviderError,
      onRetry: (error, attempt, delayMs) => {
        console.warn(`⚠️ ${label} failed (attempt ${attempt}/${this.policy.maxAttempts}): ${errorMessage(error)}. Retrying in ${delayMs}ms`);
      }
    });
  }
}
