import Joi from 'joi';
import path from 'path';
import { promises as fs } from 'fs';
import { ConfigError } from '../models/errors';
import { ExclusionRules, KeywordCategory, ScoringWeights, SentimentMode } from '../types/models';
import { BackoffStrategy, RetryPolicy } from '../utils/retry';
import { intervalToCron, intervalToMs } from '../utils/duration';

export interface AppConfig {
  monitoredMailboxes: string[];
  distributionListEmail: string;
  weights: ScoringWeights;
  exclusions: ExclusionRules;
  schedulingIntervals: {
    mainLoop: string;
    fpFeedbackLoop: string;
    fnFeedbackLoop: string;
  };
  providerRetry: RetryPolicy;
  sentimentRetry: RetryPolicy;
  sentimentFallback: boolean;
  sentiment: {
    backend: 'openai' | 'http';
    model: string;
    endpoint?: string;
  };
  topEmails: number;
  emailFilter: {
    startDate: Date | null;
  };
  deleteOriginal: boolean;
  deltaTokenPath: string;
  keywordFiles: Record<KeywordCategory, string>;
  batchDeadlineMs: number;
  requireContiguousProgress: boolean;
  feedback: FeedbackSettings;
  api: {
    enabled: boolean;
    port: number;
  };
}

export interface FeedbackSettings {
  step: number;
  minMultiplier: number;
  maxMultiplier: number;
  lookbackMs: number;
  candidateLimit: number;
}

// Shape of config.json after Joi has applied defaults
interface RawConfig {
  monitored_mailboxes: string[];
  distribution_list_email: string;
  keyword_threshold: number;
  sentiment_threshold: number;
  sentiment_mode: SentimentMode;
  sentiment_band: number;
  keyword_saturation: number;
  weights: {
    body_keyword: number;
    subject_keyword: number;
    urgency: number;
    negation: number;
    sentiment: number;
  };
  exclusions: { from: string[]; subject: string[] };
  contextual_check: {
    use_contextual_check: boolean;
    contextual_score_threshold: number;
    negation_proximity: number;
    negative_words: string[];
  };
  scheduling_intervals: {
    main_loop: string;
    fp_feedback_loop: string;
    fn_feedback_loop: string;
  };
  max_retries: number;
  retry_delay: number;
  retry_backoff: BackoffStrategy;
  sentiment_pipeline_max_retries: number;
  sentiment_pipeline_retry_delay: number;
  sentiment_fallback: boolean;
  sentiment: { backend: 'openai' | 'http'; model: string; endpoint?: string };
  top_emails: number;
  email_filter: { start_date: string };
  delete_original: boolean;
  delta_token_path?: string;
  delta_token_file?: string;
  keyword_files: Record<KeywordCategory, string>;
  batch_deadline: string;
  require_contiguous_progress: boolean;
  feedback: {
    step: number;
    min_multiplier: number;
    max_multiplier: number;
    lookback: string;
    candidate_limit: number;
  };
  api: { enabled: boolean; port: number };
}

const interval = Joi.string().pattern(/^\d+\s*[smh]$/).messages({
  'string.pattern.base': '{{#label}} must be a number followed by s, m or h'
});

export const configSchema = Joi.object<RawConfig>({
  monitored_mailboxes: Joi.array().items(Joi.string().email()).min(1).unique().required(),
  distribution_list_email: Joi.string().email().required(),
  keyword_threshold: Joi.number().greater(0).required(),
  sentiment_threshold: Joi.number().min(0).max(1).required(),
  sentiment_mode: Joi.string().valid('gate', 'additive', 'off').default('gate'),
  sentiment_band: Joi.number().greater(0).default(0.1),
  keyword_saturation: Joi.number().integer().min(1).default(3),
  weights: Joi.object({
    body_keyword: Joi.number().min(0).required(),
    subject_keyword: Joi.number().min(0).required(),
    urgency: Joi.number().min(0).required(),
    negation: Joi.number().max(0).required(),
    sentiment: Joi.number().min(0).default(0.4)
  }).required(),
  exclusions: Joi.object({
    from: Joi.array().items(Joi.string()).default([]),
    subject: Joi.array().items(Joi.string()).default([])
  }).default(),
  contextual_check: Joi.object({
    use_contextual_check: Joi.boolean().default(true),
    contextual_score_threshold: Joi.number().min(0).max(1).default(0.25),
    negation_proximity: Joi.number().integer().min(0).default(3),
    negative_words: Joi.array().items(Joi.string().trim().lowercase().min(1)).default([])
  }).default(),
  scheduling_intervals: Joi.object({
    main_loop: interval.default('30s'),
    fp_feedback_loop: interval.default('2m'),
    fn_feedback_loop: interval.default('2m')
  }).default(),
  max_retries: Joi.number().integer().min(1).default(3),
  retry_delay: Joi.number().min(0).default(5),
  retry_backoff: Joi.string().valid('fixed', 'linear', 'exponential').default('fixed'),
  sentiment_pipeline_max_retries: Joi.number().integer().min(1).default(3),
  sentiment_pipeline_retry_delay: Joi.number().min(0).default(2),
  sentiment_fallback: Joi.boolean().default(false),
  sentiment: Joi.object({
    backend: Joi.string().valid('openai', 'http').default('openai'),
    model: Joi.string().default('gpt-4o-mini'),
    endpoint: Joi.string().uri().when('backend', { is: 'http', then: Joi.required() })
  }).default(),
  top_emails: Joi.number().integer().min(1).max(500).default(50),
  email_filter: Joi.object({
    start_date: Joi.string().isoDate().allow('').default('')
  }).unknown(true).default(),
  delete_original: Joi.boolean().default(false),
  delta_token_path: Joi.string(),
  delta_token_file: Joi.string(),
  keyword_files: Joi.object({
    complaint: Joi.string().required(),
    subject: Joi.string().required(),
    urgency: Joi.string().required(),
    negation: Joi.string().required()
  }).default({
    complaint: 'keywords/complaint.txt',
    subject: 'keywords/subject.txt',
    urgency: 'keywords/urgency.txt',
    negation: 'keywords/negation.txt'
  }),
  batch_deadline: interval.default('2m'),
  require_contiguous_progress: Joi.boolean().default(true),
  feedback: Joi.object({
    step: Joi.number().greater(0).default(0.1),
    min_multiplier: Joi.number().min(0).default(0.2),
    max_multiplier: Joi.number().greater(0).min(Joi.ref('min_multiplier')).default(2),
    lookback: interval.default('1h'),
    candidate_limit: Joi.number().integer().min(0).default(5)
  }).default(),
  api: Joi.object({
    enabled: Joi.boolean().default(true),
    port: Joi.number().port().default(3000)
  }).default()
});

/**
 * Validates a parsed config.json document. Relative file paths are
 * resolved against baseDir (the directory holding config.json).
 */
export function parseConfig(document: unknown, baseDir: string): AppConfig {
  const { error, value } = configSchema.validate(document, { abortEarly: false });
  if (error || !value) {
    const details = error ? error.details.map(detail => detail.message) : [];
    throw new ConfigError(`Configuration validation error: ${details.join('; ')}`, details);
  }

  // Fail fast on intervals that cron cannot express
  intervalToCron(value.scheduling_intervals.main_loop);
  intervalToCron(value.scheduling_intervals.fp_feedback_loop);
  intervalToCron(value.scheduling_intervals.fn_feedback_loop);

  const resolve = (file: string) => path.resolve(baseDir, file);

  return {
    monitoredMailboxes: value.monitored_mailboxes.map(mailbox => mailbox.toLowerCase()),
    distributionListEmail: value.distribution_list_email,
    weights: {
      bodyKeyword: value.weights.body_keyword,
      subjectKeyword: value.weights.subject_keyword,
      urgency: value.weights.urgency,
      negation: value.weights.negation,
      sentiment: value.weights.sentiment,
      keywordThreshold: value.keyword_threshold,
      sentimentThreshold: value.sentiment_threshold,
      sentimentBand: value.sentiment_band,
      keywordSaturation: value.keyword_saturation,
      sentimentMode: value.sentiment_mode,
      contextualCheck: {
        enabled: value.contextual_check.use_contextual_check,
        proximity: value.contextual_check.negation_proximity,
        scoreThreshold: value.contextual_check.contextual_score_threshold,
        negativeWords: value.contextual_check.negative_words
      }
    },
    exclusions: {
      from: compilePatterns(value.exclusions.from, 'exclusions.from'),
      subject: compilePatterns(value.exclusions.subject, 'exclusions.subject')
    },
    schedulingIntervals: {
      mainLoop: value.scheduling_intervals.main_loop,
      fpFeedbackLoop: value.scheduling_intervals.fp_feedback_loop,
      fnFeedbackLoop: value.scheduling_intervals.fn_feedback_loop
    },
    providerRetry: {
      maxAttempts: value.max_retries,
      delayMs: value.retry_delay * 1000,
      backoff: value.retry_backoff
    },
    sentimentRetry: {
      maxAttempts: value.sentiment_pipeline_max_retries,
      delayMs: value.sentiment_pipeline_retry_delay * 1000,
      backoff: value.retry_backoff
    },
    sentimentFallback: value.sentiment_fallback,
    sentiment: value.sentiment,
    topEmails: value.top_emails,
    emailFilter: {
      startDate: value.email_filter.start_date ? new Date(value.email_filter.start_date) : null
    },
    deleteOriginal: value.delete_original,
    deltaTokenPath: resolve(value.delta_token_path ?? value.delta_token_file ?? 'data/complaints.db'),
    keywordFiles: {
      complaint: resolve(value.keyword_files.complaint),
      subject: resolve(value.keyword_files.subject),
      urgency: resolve(value.keyword_files.urgency),
      negation: resolve(value.keyword_files.negation)
    },
    batchDeadlineMs: intervalToMs(value.batch_deadline),
    requireContiguousProgress: value.require_contiguous_progress,
    feedback: {
      step: value.feedback.step,
      minMultiplier: value.feedback.min_multiplier,
      maxMultiplier: value.feedback.max_multiplier,
      lookbackMs: intervalToMs(value.feedback.lookback),
      candidateLimit: value.feedback.candidate_limit
    },
    api: value.api
  };
}

/**
 * Reads and validates the configuration file
 */
export async function loadConfig(configPath: string): Promise<AppConfig> {
  let contents: string;
  try {
    contents = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Configuration file '${configPath}' could not be read: ${error instanceof Error ? error.message : error}`);
  }

  let document: unknown;
  try {
    document = JSON.parse(contents);
  } catch (error) {
    throw new ConfigError(`Error decoding configuration file '${configPath}': ${error instanceof Error ? error.message : error}`);
  }

  const config = parseConfig(document, path.dirname(path.resolve(configPath)));
  console.log(`✅ Configuration loaded from ${configPath} (${config.monitoredMailboxes.length} mailboxes)`);
  return config;
}

/**
 * Exclusion patterns match from the start of the value, case-insensitively
 */
export function compilePatterns(patterns: string[], label: string): RegExp[] {
  return patterns.map(pattern => {
    try {
      return new RegExp(`^(?:${pattern})`, 'i');
    } catch (error) {
      throw new ConfigError(`Invalid pattern in ${label}: "${pattern}"`);
    }
  });
}
