import OpenAI from 'openai';
import Joi from 'joi';
import { ConfigError } from '../../models/errors';
import { RawSentiment, SentimentBackend } from './SentimentAdapter';

const MAX_CONTENT_LENGTH = 2000;

const responseSchema = Joi.object<RawSentiment>({
  label: Joi.string().valid('NEGATIVE', 'NEUTRAL', 'POSITIVE').insensitive().required(),
  score: Joi.number().min(0).max(1).required()
}).unknown(true);

/**
 * Sentiment classification through a chat completion model
 */
export class OpenAISentimentBackend implements SentimentBackend {
  readonly name = 'openai';
  private openai: OpenAI;

  constructor(apiKey: string | undefined, private model: string) {
    if (!apiKey) {
      throw new ConfigError('OPENAI_API_KEY environment variable is required for the openai sentiment backend');
    }

    this.openai = new OpenAI({
      apiKey: apiKey
    });
  }

  async infer(text: string, signal?: AbortSignal): Promise<RawSentiment> {
    const response = await this.openai.chat.completions.create(
      {
        model: this.model,
        messages: [
          {
            role: 'system',
            content: 'You classify the sentiment of customer emails. Respond with JSON of the form {"label": "NEGATIVE" | "NEUTRAL" | "POSITIVE", "score": <confidence between 0 and 1>}.'
          },
          {
            role: 'user',
            content: this.sanitize(text)
          }
        ],
        temperature: 0,
        max_tokens: 50,
        response_format: { type: 'json_object' }
      },
      { signal }
    );

    return this.parseResponse(response.choices[0]?.message.content ?? null);
  }

  private sanitize(text: string): string {
    let content = text || '[Empty]';
    if (content.length > MAX_CONTENT_LENGTH) {
      content = content.substring(0, MAX_CONTENT_LENGTH) + '... [truncated]';
    }

    return content
      .replace(/\b\d{4}[-\s]?\d{4}[-\s]?\d{4}[-\s]?\d{4}\b/g, '[CARD_NUMBER]')
      .replace(/\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g, '[EMAIL]');
  }

  private parseResponse(content: string | null): RawSentiment {
    if (!content) {
      throw new Error('Empty response from OpenAI');
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new Error(`Invalid JSON response from OpenAI: ${content.substring(0, 200)}`);
    }

    const { error, value } = responseSchema.validate(parsed);
    if (error || !value) {
      throw new Error(`Unexpected sentiment response from OpenAI: ${error ? error.message : 'empty'}`);
    }

    return { label: value.label.toUpperCase(), score: value.score };
  }
}
