/**
 * Service account credentials with domain-wide delegation: one client per
 * monitored mailbox, each impersonating that mailbox.
 */

import { JWT } from 'google-auth-library';
import { ConfigError } from '../../models/errors';

export interface ServiceAccountCredentials {
  clientEmail: string;
  privateKey: string;
}

export class ServiceAccountAuth {
  private readonly scopes = [
    'https://www.googleapis.com/auth/gmail.modify',
    'https://www.googleapis.com/auth/gmail.send'
  ];
  private clients = new Map<string, JWT>();

  constructor(private readonly credentials: ServiceAccountCredentials) {
    if (!credentials.clientEmail || !credentials.privateKey) {
      throw new ConfigError('GOOGLE_SERVICE_ACCOUNT_EMAIL and GOOGLE_PRIVATE_KEY are required');
    }
  }

  /**
   * Reads credentials from the environment
   */
  static fromEnvironment(env: NodeJS.ProcessEnv = process.env): ServiceAccountAuth {
    return new ServiceAccountAuth({
      clientEmail: env.GOOGLE_SERVICE_ACCOUNT_EMAIL || '',
      // Keys pasted into .env usually carry escaped newlines
      privateKey: (env.GOOGLE_PRIVATE_KEY || '').replace(/\\n/g, '\n')
    });
  }

  clientFor(mailboxId: string): JWT {
    const existing = this.clients.get(mailboxId);
    if (existing) {
      return existing;
    }

    const client = new JWT({
      email: this.credentials.clientEmail,
      key: this.credentials.privateKey,
      scopes: this.scopes,
      subject: mailboxId
    });
    this.clients.set(mailboxId, client);
    return client;
  }

  /**
   * Obtains an access token for the mailbox, failing if delegation is not granted
   */
  async verifyAccess(mailboxId: string): Promise<void> {
    const { token } = await this.clientFor(mailboxId).getAccessToken();
    if (!token) {
      throw new ConfigError(`Could not obtain an access token for ${mailboxId}`);
    }
  }
}
