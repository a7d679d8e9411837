/**
 * EmailParser turns Gmail API messages into provider-neutral Message objects
 */

import { gmail_v1 } from 'googleapis';
import { Message } from '../../types/models';

interface MessageBody {
  text: string;
  html?: string;
}

export class EmailParser {
  /**
   * Parses a message fetched with format=full
   */
  parseMessage(raw: gmail_v1.Schema$Message, mailboxId: string): Message {
    if (!raw.id || !raw.payload) {
      throw new Error(`Invalid message data for ID: ${raw.id ?? 'unknown'}`);
    }

    const headers = this.extractHeaders(raw.payload);
    const body = this.extractBody(raw.payload);

    return {
      id: raw.id,
      mailboxId,
      sender: this.parseEmailAddress(headers.get('from') || ''),
      subject: headers.get('subject') || '',
      body: body.text,
      recipients: this.parseRecipients(headers),
      receivedAt: new Date(parseInt(raw.internalDate || '0', 10)),
      metadata: {
        threadId: raw.threadId || undefined,
        labels: raw.labelIds || [],
        htmlBody: body.html
      }
    };
  }

  // Header names are lowercased
  private extractHeaders(payload: gmail_v1.Schema$MessagePart): Map<string, string> {
    const headers = new Map<string, string>();

    for (const header of payload.headers || []) {
      if (header.name && header.value) {
        headers.set(header.name.toLowerCase(), header.value);
      }
    }

    return headers;
  }

  private extractBody(payload: gmail_v1.Schema$MessagePart): MessageBody {
    const result: MessageBody = { text: '' };

    // Single part message
    if (payload.body?.data) {
      const content = this.decodeBase64Url(payload.body.data);
      if (payload.mimeType === 'text/html') {
        result.html = content;
        result.text = this.stripHtml(content);
      } else {
        result.text = content;
      }
      return result;
    }

    if (payload.parts) {
      this.extractBodyFromParts(payload.parts, result);
    }

    return result;
  }

  /**
   * Walks nested multipart bodies. Plain text wins over HTML when both exist.
   */
  private extractBodyFromParts(parts: gmail_v1.Schema$MessagePart[], result: MessageBody): void {
    for (const part of parts) {
      if (part.filename) {
        continue; // attachment
      }

      if (part.mimeType === 'text/plain' && part.body?.data) {
        result.text += this.decodeBase64Url(part.body.data);
      } else if (part.mimeType === 'text/html' && part.body?.data) {
        const htmlContent = this.decodeBase64Url(part.body.data);
        result.html = (result.html || '') + htmlContent;
        if (!result.text) {
          result.text = this.stripHtml(htmlContent);
        }
      } else if (part.parts) {
        this.extractBodyFromParts(part.parts, result);
      }
    }
  }

  private decodeBase64Url(data: string): string {
    const base64 = data.replace(/-/g, '+').replace(/_/g, '/');
    const padded = base64 + '='.repeat((4 - base64.length % 4) % 4);

    if (!/^[A-Za-z0-9+/]*={0,2}$/.test(padded)) {
      console.error('❌ Skipping message part with invalid base64url data');
      return '';
    }

    return Buffer.from(padded, 'base64').toString('utf-8');
  }

  stripHtml(html: string): string {
    return html
      .replace(/<(style|script)[^>]*>[\s\S]*?<\/\1>/gi, ' ')
      .replace(/<\/?(h[1-6]|p|div|br|li|tr)[^>]*>/gi, ' ')
      .replace(/<[^>]*>/g, '')
      .replace(/&nbsp;/g, ' ')
      .replace(/&amp;/g, '&')
      .replace(/&lt;/g, '<')
      .replace(/&gt;/g, '>')
      .replace(/&quot;/g, '"')
      .replace(/&#39;/g, "'")
      .replace(/\s+/g, ' ')
      .trim();
  }

  /**
   * "Name <user@domain>" and bare addresses both yield the lowercased address
   */
  parseEmailAddress(addressHeader: string): string {
    const emailMatch = addressHeader.match(/<([^>]+)>/);
    if (emailMatch) {
      return emailMatch[1].trim().toLowerCase();
    }

    return addressHeader.trim().replace(/^["']|["']$/g, '').toLowerCase();
  }

  private parseRecipients(headers: Map<string, string>): string[] {
    const recipients: string[] = [];

    for (const name of ['to', 'cc', 'bcc']) {
      const value = headers.get(name);
      if (value) {
        recipients.push(...this.parseMultipleEmailAddresses(value));
      }
    }

    return [...new Set(recipients)];
  }

  /**
   * Splits a comma-separated address list, ignoring commas inside quoted
   * display names and angle brackets
   */
  private parseMultipleEmailAddresses(addressesHeader: string): string[] {
    const addresses: string[] = [];
    let current = '';
    let inQuotes = false;
    let inAngleBrackets = false;

    for (const char of addressesHeader) {
      if (char === '"' && !inAngleBrackets) {
        inQuotes = !inQuotes;
      } else if (char === '<' && !inQuotes) {
        inAngleBrackets = true;
      } else if (char === '>' && !inQuotes) {
        inAngleBrackets = false;
      } else if (char === ',' && !inQuotes && !inAngleBrackets) {
        if (current.trim()) {
          addresses.push(this.parseEmailAddress(current));
        }
        current = '';
        continue;
      }

      current += char;
    }

    if (current.trim()) {
      addresses.push(this.parseEmailAddress(current));
    }

    return addresses.filter(address => address.includes('@'));
  }
}
