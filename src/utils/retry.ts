import { OperationAborted } from '../models/errors';

export type BackoffStrategy = 'fixed' | 'linear' | 'exponential';

export interface RetryPolicy {
  maxAttempts: number;
  delayMs: number;
  backoff: BackoffStrategy;
}

export interface RetryOptions {
  signal?: AbortSignal;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Delay to wait after the given (1-based) failed attempt
 */
export function computeDelay(policy: RetryPolicy, attempt: number): number {
  switch (policy.backoff) {
    case 'linear':
      return policy.delayMs * attempt;
    case 'exponential':
      return policy.delayMs * Math.pow(2, attempt - 1);
    default:
      return policy.delayMs;
  }
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new OperationAborted(abortReason(signal));
  }
}

/**
 * setTimeout-based sleep that rejects as soon as the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new OperationAborted(abortReason(signal)));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new OperationAborted(abortReason(signal)));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Runs an operation under a retry policy. The last error is rethrown once
 * attempts are exhausted; the signal is checked before every attempt and
 * interrupts the delay between attempts.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<T> {
  const attempts = Math.max(1, policy.maxAttempts);
  let lastError: unknown = new Error('Retry policy allowed no attempts');

  for (let attempt = 1; attempt <= attempts; attempt++) {
    throwIfAborted(options.signal);

    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;

      if (error instanceof OperationAborted || options.signal?.aborted) {
        throw error instanceof OperationAborted ? error : new OperationAborted(abortReason(options.signal));
      }
      if (options.isRetryable && !options.isRetryable(error)) {
        throw error;
      }

      if (attempt < attempts) {
        const delayMs = computeDelay(policy, attempt);
        options.onRetry?.(error, attempt, delayMs);
        await sleep(delayMs, options.signal);
      }
    }
  }

  throw lastError;
}

function abortReason(signal?: AbortSignal): string {
  const reason: unknown = signal?.reason;
  if (reason instanceof Error) return reason.message;
  if (typeof reason === 'string') return reason;
  return 'Operation aborted';
}

/**
 * A signal that aborts as soon as any of the given signals does
 */
export function linkSignals(...signals: AbortSignal[]): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const listeners: Array<[AbortSignal, () => void]> = [];

  const dispose = () => {
    for (const [source, listener] of listeners) {
      source.removeEventListener('abort', listener);
    }
    listeners.length = 0;
  };

  for (const source of signals) {
    if (source.aborted) {
      controller.abort(source.reason);
      break;
    }
    const listener = () => {
      controller.abort(source.reason);
      dispose();
    };
    source.addEventListener('abort', listener, { once: true });
    listeners.push([source, listener]);
  }

  return { signal: controller.signal, dispose };
}
