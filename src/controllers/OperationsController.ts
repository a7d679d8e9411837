import { Request, Response } from 'express';
import { CursorStore } from '../services/sync/CursorStore';
import { KeywordStore } from '../services/keywords/KeywordStore';
import { FeedbackRepository } from '../repositories/FeedbackRepository';
import { ConfigError, errorMessage } from '../models/errors';

/**
 * OperationsController reports sync state and manages keyword state
 */
export class OperationsController {
  constructor(
    private cursors: CursorStore,
    private keywordStore: KeywordStore,
    private feedback: FeedbackRepository
  ) {}

  /**
   * GET /api/sync/status
   */
  async getSyncStatus(req: Request, res: Response): Promise<void> {
    try {
      const [statistics, errors, mailboxes, pendingFeedback] = await Promise.all([
        this.cursors.getStatistics(),
        this.cursors.getMailboxesWithErrors(),
        this.cursors.list(),
        this.feedback.countPending()
      ]);

      res.json({
        statistics,
        errors,
        mailboxes,
        pendingFeedback,
        keywordGeneration: this.keywordStore.current().generation
      });
    } catch (error) {
      console.error('❌ Error getting sync status:', error);
      res.status(500).json({
        error: 'Internal server error',
        message: 'Failed to get sync status'
      });
    }
  }

  /**
   * Drop a mailbox cursor so the next pass resyncs from the window
   * POST /api/sync/:mailboxId/reset
   */
  async resetCursor(req: Request, res: Response): Promise<void> {
    try {
      const mailboxId = req.params.mailboxId.toLowerCase();
      const cursor = await this.cursors.get(mailboxId);
      if (!cursor) {
        res.status(404).json({
          error: 'Not found',
          message: `No sync state for ${mailboxId}`
        });
        return;
      }

      await this.cursors.reset(mailboxId);
      console.log(`🔄 [SYNC] Cursor reset for ${mailboxId}`);
      res.json({ message: `Cursor reset for ${mailboxId}` });
    } catch (error) {
      console.error('❌ Error resetting cursor:', error);
      res.status(500).json({
        error: 'Internal server error',
        message: 'Failed to reset cursor'
      });
    }
  }

  /**
   * POST /api/keywords/reload
   */
  async reloadKeywords(req: Request, res: Response): Promise<void> {
    try {
      const snapshot = await this.keywordStore.refresh();
      res.json({
        generation: snapshot.generation,
        counts: {
          complaint: snapshot.keywords.complaint.size,
          subject: snapshot.keywords.subject.size,
          urgency: snapshot.keywords.urgency.size,
          negation: snapshot.keywords.negation.size
        }
      });
    } catch (error) {
      console.error(`❌ Keyword reload failed: ${errorMessage(error)}`);
      res.status(500).json({
        error: 'Keyword reload failed',
        message: error instanceof ConfigError ? error.message : 'Failed to reload keywords'
      });
    }
  }

  /**
   * Learned multipliers and candidate terms
   * GET /api/keywords
   */
  async getKeywordState(req: Request, res: Response): Promise<void> {
    try {
      const [adjustments, candidates] = await Promise.all([
        this.feedback.listAdjustments(),
        this.feedback.topCandidates()
      ]);
      res.json({
        generation: this.keywordStore.current().generation,
        adjustments,
        candidates
      });
    } catch (error) {
      console.error('❌ Error getting keyword state:', error);
      res.status(500).json({
        error: 'Internal server error',
        message: 'Failed to get keyword state'
      });
    }
  }
}
