import Joi from 'joi';
import { FeedbackKind, Message, SyncStatus } from '../types/models';

/**
 * Validation schemas and functions for data models
 */

export const messageSchema = Joi.object<Message>({
  id: Joi.string().required(),
  mailboxId: Joi.string().email().required(),
  sender: Joi.string().allow('').required(),
  subject: Joi.string().allow('').required(),
  body: Joi.string().allow('').required(),
  recipients: Joi.array().items(Joi.string()).required(),
  receivedAt: Joi.date().required(),
  metadata: Joi.object({
    threadId: Joi.string().optional(),
    labels: Joi.array().items(Joi.string()).required(),
    htmlBody: Joi.string().allow('').optional()
  }).required()
});

export interface FeedbackRequest {
  mailboxId: string;
  messageId: string;
  verdict: FeedbackKind;
}

export const feedbackRequestSchema = Joi.object<FeedbackRequest>({
  mailboxId: Joi.string().email().lowercase().required(),
  messageId: Joi.string().pattern(/^[a-zA-Z0-9._-]+$/).max(256).required(),
  verdict: Joi.string().valid('false_positive', 'false_negative').required()
});

// Validation functions
export function validateMessage(message: unknown): { error?: Joi.ValidationError; value?: Message } {
  return messageSchema.validate(message, { abortEarly: false });
}

export function validateFeedbackRequest(body: unknown): { error?: Joi.ValidationError; value?: FeedbackRequest } {
  return feedbackRequestSchema.validate(body, { abortEarly: false });
}

export function isValidSyncStatus(status: string): status is SyncStatus {
  return ['idle', 'syncing', 'error'].includes(status);
}
