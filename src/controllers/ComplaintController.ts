import { Request, Response } from 'express';
import { ClassificationRepository } from '../repositories/ClassificationRepository';
import { FeedbackRepository } from '../repositories/FeedbackRepository';
import { AuthenticatedRequest } from '../middleware/auth';
import { validateFeedbackRequest } from '../models/validation';
import { errorMessage } from '../models/errors';

/**
 * ComplaintController exposes classification records and accepts
 * operator verdicts on them
 */
export class ComplaintController {
  constructor(
    private classifications: ClassificationRepository,
    private feedback: FeedbackRepository
  ) {}

  /**
   * Get the stored decision for a message
   * GET /api/classifications/:mailboxId/:messageId
   */
  async getClassification(req: Request, res: Response): Promise<void> {
    try {
      const mailboxId = req.params.mailboxId.toLowerCase();
      const record = await this.classifications.get(mailboxId, req.params.messageId);

      if (!record) {
        res.status(404).json({
          error: 'Not found',
          message: `No classification for message ${req.params.messageId} in ${mailboxId}`
        });
        return;
      }

      res.json({ classification: record });
    } catch (error) {
      console.error('❌ Error fetching classification:', error);
      res.status(500).json({
        error: 'Internal server error',
        message: 'Failed to fetch classification'
      });
    }
  }

  /**
   * Record an operator verdict
   * POST /api/feedback
   */
  async submitFeedback(req: AuthenticatedRequest, res: Response): Promise<void> {
    const { error, value } = validateFeedbackRequest(req.body);
    if (error || !value) {
      res.status(400).json({
        error: 'Validation error',
        message: error ? error.message : 'Request body is required',
        details: error ? error.details.map(detail => detail.message) : []
      });
      return;
    }

    try {
      const signal = await this.feedback.recordSignal({
        mailboxId: value.mailboxId,
        messageId: value.messageId,
        kind: value.verdict,
        source: 'operator'
      });

      if (!signal) {
        res.status(409).json({
          error: 'Duplicate feedback',
          message: `A ${value.verdict} verdict for ${value.messageId} was already recorded`
        });
        return;
      }

      console.log(`📧 Operator ${req.operator?.id ?? 'unknown'} reported ${value.verdict} for ${value.messageId}`);
      res.status(201).json({ feedback: signal });
    } catch (error) {
      console.error(`❌ Error recording feedback: ${errorMessage(error)}`);
      res.status(500).json({
        error: 'Internal server error',
        message: 'Failed to record feedback'
      });
    }
  }
}
