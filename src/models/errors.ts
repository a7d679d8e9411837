/**
 * Error taxonomy shared by the classification and sync layers
 */

// Missing or invalid configuration or keyword source. Fatal at startup.
export class ConfigError extends Error {
  constructor(message: string, public readonly details: string[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}

// Mail provider or sentiment backend unreachable. Retried with backoff.
export class TransientProviderError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'TransientProviderError';
  }
}

// The provider rejected a delta cursor; callers fall back to a windowed resync.
export class CursorExpired extends Error {
  constructor(public readonly mailboxId: string, public readonly cursor: string) {
    super(`Cursor ${cursor} for ${mailboxId} is no longer accepted by the provider`);
    this.name = 'CursorExpired';
  }
}

// The message vanished between listing and fetch (deleted or moved)
export class MessageNotFound extends Error {
  constructor(public readonly mailboxId: string, public readonly messageId: string) {
    super(`Message ${messageId} no longer exists in ${mailboxId}`);
    this.name = 'MessageNotFound';
  }
}

export class SentimentUnavailable extends Error {
  constructor(message: string, public readonly attempts: number, public readonly cause?: unknown) {
    super(message);
    this.name = 'SentimentUnavailable';
  }
}

// Raised when an in-flight operation observes a shutdown or deadline signal
export class OperationAborted extends Error {
  constructor(message: string = 'Operation aborted') {
    super(message);
    this.name = 'OperationAborted';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
