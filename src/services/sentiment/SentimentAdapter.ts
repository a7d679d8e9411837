import { OperationAborted, SentimentUnavailable, errorMessage } from '../../models/errors';
import { SentimentReading } from '../../types/models';
import { RetryPolicy, withRetry } from '../../utils/retry';

export interface RawSentiment {
  label: string;
  score: number;
}

/**
 * A model that labels text as negative, neutral or positive
 */
export interface SentimentBackend {
  readonly name: string;
  infer(text: string, signal?: AbortSignal): Promise<RawSentiment>;
}

export interface SentimentScorer {
  score(text: string, signal?: AbortSignal): Promise<SentimentReading>;
}

export const NEUTRAL_SENTIMENT = 0.5;

/**
 * Maps a backend label and its confidence to the probability that the
 * text is negative
 */
export function normalizeSentiment(raw: RawSentiment): number {
  if (!Number.isFinite(raw.score) || raw.score < 0 || raw.score > 1) {
    throw new Error(`Sentiment score out of range: ${raw.score}`);
  }

  switch (raw.label.trim().toUpperCase()) {
    case 'NEGATIVE':
    case 'LABEL_0':
      return raw.score;
    case 'POSITIVE':
    case 'LABEL_2':
      return 1 - raw.score;
    case 'NEUTRAL':
    case 'LABEL_1':
      return (1 - raw.score) / 2;
    default:
      throw new Error(`Unrecognized sentiment label: ${raw.label}`);
  }
}

/**
 * Wraps a backend with retries and an optional neutral fallback
 */
export class SentimentAdapter implements SentimentScorer {
  constructor(
    private backend: SentimentBackend,
    private retryPolicy: RetryPolicy,
    private fallback: boolean = false
  ) {}

  async score(text: string, signal?: AbortSignal): Promise<SentimentReading> {
    try {
      return await withRetry(
        async () => {
          const raw = await this.backend.infer(text, signal);
          return { score: normalizeSentiment(raw), label: raw.label, fallback: false };
        },
        this.retryPolicy,
        {
          signal,
          onRetry: (error, attempt, delayMs) => {
            console.warn(`⚠️ Sentiment backend ${this.backend.name} failed (attempt ${attempt}): ${errorMessage(error)}. Retrying in ${delayMs}ms`);
          }
        }
      );
    } catch (error) {
      if (error instanceof OperationAborted) {
        throw error;
      }

      if (this.fallback) {
        console.warn(`⚠️ Sentiment backend ${this.backend.name} unavailable, using keyword score only: ${errorMessage(error)}`);
        return { score: NEUTRAL_SENTIMENT, label: 'UNAVAILABLE', fallback: true };
      }

      throw new SentimentUnavailable(
        `Sentiment backend ${this.backend.name} unavailable after ${this.retryPolicy.maxAttempts} attempts: ${errorMessage(error)}`,
        this.retryPolicy.maxAttempts,
        error
      );
    }
  }
}
