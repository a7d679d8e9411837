/**
 * Gmail implementation of MailProvider. Deltas come from the history API;
 * the profile historyId is the baseline cursor for windowed fetches.
 */

import { google, gmail_v1 } from 'googleapis';
import MailComposer from 'nodemailer/lib/mail-composer';
import { CursorExpired, MessageNotFound, OperationAborted, TransientProviderError, errorMessage } from '../../models/errors';
import { validateMessage } from '../../models/validation';
import { Message } from '../../types/models';
import { ServiceAccountAuth } from '../auth/ServiceAccountAuth';
import { EmailParser } from './EmailParser';
import {
  ForwardRequest, MailProvider, MessageListing, RequestOptions, SearchFilter, WindowFilter
} from './MailProvider';

interface RequestConfig {
  signal?: AbortSignal;
}

/**
 * The subset of the Gmail API this provider calls
 */
export interface GmailApi {
  users: {
    getProfile(params: gmail_v1.Params$Resource$Users$Getprofile, options: RequestConfig): Promise<{ data: gmail_v1.Schema$Profile }>;
    history: {
      list(params: gmail_v1.Params$Resource$Users$History$List, options: RequestConfig): Promise<{ data: gmail_v1.Schema$ListHistoryResponse }>;
    };
    messages: {
      list(params: gmail_v1.Params$Resource$Users$Messages$List, options: RequestConfig): Promise<{ data: gmail_v1.Schema$ListMessagesResponse }>;
      get(params: gmail_v1.Params$Resource$Users$Messages$Get, options: RequestConfig): Promise<{ data: gmail_v1.Schema$Message }>;
      send(params: gmail_v1.Params$Resource$Users$Messages$Send, options: RequestConfig): Promise<{ data: gmail_v1.Schema$Message }>;
      trash(params: gmail_v1.Params$Resource$Users$Messages$Trash, options: RequestConfig): Promise<{ data: gmail_v1.Schema$Message }>;
    };
  };
}

export type GmailClientFactory = (mailboxId: string) => GmailApi;

export class GmailProvider implements MailProvider {
  private clients = new Map<string, GmailApi>();
  private rateLimiter = new RateLimiter();
  private parser = new EmailParser();

  constructor(private readonly createClient: GmailClientFactory) {}

  static withServiceAccount(auth: ServiceAccountAuth): GmailProvider {
    return new GmailProvider(mailboxId => google.gmail({ version: 'v1', auth: auth.clientFor(mailboxId) }));
  }

  async listChanges(mailboxId: string, cursor: string, options: RequestOptions = {}): Promise<MessageListing> {
    const messageIds: string[] = [];
    const seen = new Set<string>();
    let nextCursor = cursor;
    let pageToken: string | undefined;

    do {
      const data = await this.call(mailboxId, options, gmail => gmail.users.history.list({
        userId: 'me',
        startHistoryId: cursor,
        historyTypes: ['messageAdded'],
        labelId: 'INBOX',
        pageToken
      }, { signal: options.signal }), { expiredCursor: cursor });

      for (const record of data.history || []) {
        for (const added of record.messagesAdded || []) {
          const id = added.message?.id;
          if (id && !seen.has(id)) {
            seen.add(id);
            messageIds.push(id);
          }
        }
      }

      nextCursor = data.historyId || nextCursor;
      pageToken = data.nextPageToken || undefined;
    } while (pageToken);

    return { messageIds, nextCursor, cursorAt: new Date() };
  }

  async listWindow(mailboxId: string, filter: WindowFilter, options: RequestOptions = {}): Promise<MessageListing> {
    // Taken before listing so nothing that arrives meanwhile is skipped
    const profile = await this.call(mailboxId, options, gmail =>
      gmail.users.getProfile({ userId: 'me' }, { signal: options.signal }));
    if (!profile.historyId) {
      throw new TransientProviderError(`Gmail profile for ${mailboxId} has no historyId`);
    }

    const ids = await this.listMessageIds(mailboxId, {
      query: filter.since ? afterQuery(filter.since) : undefined,
      labelIds: ['INBOX'],
      limit: filter.limit
    }, options);

    return {
      // Gmail lists newest first
      messageIds: ids.reverse(),
      nextCursor: profile.historyId,
      cursorAt: new Date()
    };
  }

  async getMessage(mailboxId: string, messageId: string, options: RequestOptions = {}): Promise<Message> {
    const raw = await this.call(mailboxId, options, gmail => gmail.users.messages.get({
      userId: 'me',
      id: messageId,
      format: 'full'
    }, { signal: options.signal }), { messageId });

    const message = this.parser.parseMessage(raw, mailboxId);
    const { error } = validateMessage(message);
    if (error) {
      throw new Error(`Message ${messageId} failed validation: ${error.message}`);
    }
    return message;
  }

  async searchMessages(mailboxId: string, filter: SearchFilter, options: RequestOptions = {}): Promise<Message[]> {
    const terms = [afterQuery(filter.since)];
    if (filter.containing) terms.push(`"${filter.containing.replace(/"/g, '')}"`);
    if (filter.sentTo) terms.push(`to:${filter.sentTo}`);
    if (filter.receivedOnly) terms.push('-from:me');

    const ids = await this.listMessageIds(mailboxId, {
      query: terms.join(' '),
      labelIds: filter.receivedOnly ? ['INBOX'] : undefined,
      limit: filter.limit
    }, options);

    const messages: Message[] = [];
    for (const id of ids) {
      messages.push(await this.getMessage(mailboxId, id, options));
    }
    return messages;
  }

  async forwardMessage(mailboxId: string, message: Message, forward: ForwardRequest, options: RequestOptions = {}): Promise<void> {
    const mime = await buildMime({
      from: mailboxId,
      to: forward.to,
      subject: forward.subject,
      text: forward.text,
      html: forward.html,
      headers: forward.headers
    });

    await this.call(mailboxId, options, gmail => gmail.users.messages.send({
      userId: 'me',
      requestBody: { raw: toBase64Url(mime) }
    }, { signal: options.signal }));

    console.log(`📧 Forwarded ${message.id} from ${mailboxId} to ${forward.to}`);
  }

  async deleteMessage(mailboxId: string, messageId: string, options: RequestOptions = {}): Promise<void> {
    await this.call(mailboxId, options, gmail => gmail.users.messages.trash({
      userId: 'me',
      id: messageId
    }, { signal: options.signal }));
  }

  private async listMessageIds(
    mailboxId: string,
    query: { query?: string; labelIds?: string[]; limit: number },
    options: RequestOptions
  ): Promise<string[]> {
    const ids: string[] = [];
    let pageToken: string | undefined;

    do {
      const data = await this.call(mailboxId, options, gmail => gmail.users.messages.list({
        userId: 'me',
        q: query.query,
        labelIds: query.labelIds,
        maxResults: Math.min(query.limit - ids.length, 500),
        includeSpamTrash: false,
        pageToken
      }, { signal: options.signal }));

      for (const item of data.messages || []) {
        if (item.id) ids.push(item.id);
      }
      pageToken = data.nextPageToken || undefined;
    } while (pageToken && ids.length < query.limit);

    return ids.slice(0, query.limit);
  }

  private gmailFor(mailboxId: string): GmailApi {
    let gmail = this.clients.get(mailboxId);
    if (!gmail) {
      gmail = this.createClient(mailboxId);
      this.clients.set(mailboxId, gmail);
    }
    return gmail;
  }

  /**
   * Runs one API request and translates failures into the provider error taxonomy
   */
  private async call<T>(
    mailboxId: string,
    options: RequestOptions,
    request: (gmail: GmailApi) => Promise<{ data: T }>,
    context: ErrorContext = {}
  ): Promise<T> {
    await this.rateLimiter.waitForSlot();

    try {
      const response = await request(this.gmailFor(mailboxId));
      return response.data;
    } catch (error) {
      throw translateError(error, mailboxId, options.signal, context);
    }
  }
}

interface ErrorContext {
  expiredCursor?: string;
  messageId?: string;
}

export function translateError(
  error: unknown,
  mailboxId: string,
  signal?: AbortSignal,
  context: ErrorContext = {}
): Error {
  if (signal?.aborted) {
    return new OperationAborted(`Gmail request for ${mailboxId} aborted`);
  }

  const status = statusOf(error);
  if (status === 404 && context.expiredCursor !== undefined) {
    return new CursorExpired(mailboxId, context.expiredCursor);
  }
  if (status === 404 && context.messageId !== undefined) {
    return new MessageNotFound(mailboxId, context.messageId);
  }
  if (status === undefined || status === 429 || status >= 500) {
    console.warn(`⚠️ Gmail API transient failure for ${mailboxId} (${status ?? 'network'}): ${errorMessage(error)}`);
    return new TransientProviderError(`Gmail request for ${mailboxId} failed: ${errorMessage(error)}`, error);
  }
  if (status === 401 || status === 403) {
    console.error(`❌ Gmail API denied access to ${mailboxId}; check domain-wide delegation`);
  }
  return error instanceof Error ? error : new Error(errorMessage(error));
}

function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  if ('response' in error && typeof error.response === 'object' && error.response !== null &&
      'status' in error.response && typeof error.response.status === 'number') {
    return error.response.status;
  }
  if ('code' in error && typeof error.code === 'number') {
    return error.code;
  }
  return undefined;
}

function afterQuery(since: Date): string {
  return `after:${Math.floor(since.getTime() / 1000)}`;
}

function buildMime(mail: ConstructorParameters<typeof MailComposer>[0]): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    new MailComposer(mail).compile().build((error, message) => {
      if (error) reject(error);
      else resolve(message);
    });
  });
}

function toBase64Url(buffer: Buffer): string {
  return buffer.toString('base64').replace(/\+/g, '-').replace(/\//g, '_').replace(/=+$/, '');
}

/**
 * Rate limiter to respect Gmail API quotas
 */
class RateLimiter {
  private requests: number[] = [];
  private readonly maxRequestsPerSecond = 10;
  private readonly windowMs = 1000;

  async waitForSlot(): Promise<void> {
    const now = Date.now();
    this.requests = this.requests.filter(time => now - time < this.windowMs);

    if (this.requests.length >= this.maxRequestsPerSecond) {
      const oldestRequest = Math.min(...this.requests);
      const waitTime = this.windowMs - (now - oldestRequest) + 10;

      if (waitTime > 0) {
        await new Promise(resolve => setTimeout(resolve, waitTime));
        return this.waitForSlot();
      }
    }

    this.requests.push(now);
  }
}
