import Joi from 'joi';
import { TransientProviderError } from '../../models/errors';
import { RawSentiment, SentimentBackend } from './SentimentAdapter';

const predictionSchema = Joi.object<RawSentiment>({
  label: Joi.string().required(),
  score: Joi.number().required()
}).unknown(true);

// Inference servers answer with a flat or nested list of label predictions
const responseSchema = Joi.alternatives().try(
  Joi.array().items(predictionSchema).min(1),
  Joi.array().items(Joi.array().items(predictionSchema).min(1)).min(1)
);

/**
 * Text-classification model behind an HTTP inference endpoint
 * (request body `{ inputs: text }`)
 */
export class HttpSentimentBackend implements SentimentBackend {
  readonly name = 'http';

  constructor(private endpoint: string, private token?: string) {}

  async infer(text: string, signal?: AbortSignal): Promise<RawSentiment> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }

    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: 'POST',
        headers,
        body: JSON.stringify({ inputs: text }),
        signal
      });
    } catch (error) {
      if (signal?.aborted) throw error;
      throw new TransientProviderError(`Sentiment endpoint unreachable: ${error instanceof Error ? error.message : error}`, error);
    }

    if (!response.ok) {
      throw new TransientProviderError(`Sentiment endpoint returned ${response.status} ${response.statusText}`);
    }

    const payload: unknown = await response.json();
    return selectPrediction(payload);
  }
}

/**
 * Picks the highest-scoring label from an inference response
 */
export function selectPrediction(payload: unknown): RawSentiment {
  const { error, value } = responseSchema.validate(payload);
  if (error || !Array.isArray(value)) {
    throw new Error(`Unexpected sentiment endpoint response: ${error ? error.message : 'not a list'}`);
  }

  const predictions: RawSentiment[] = value.flat();
  let best = predictions[0];
  for (const prediction of predictions) {
    if (prediction.score > best.score) {
      best = prediction;
    }
  }
  return { label: best.label, score: best.score };
}
