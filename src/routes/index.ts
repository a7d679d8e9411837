import { Router } from 'express';
import { ComplaintController } from '../controllers/ComplaintController';
import { OperationsController } from '../controllers/OperationsController';
import { ClassificationRepository } from '../repositories/ClassificationRepository';
import { FeedbackRepository } from '../repositories/FeedbackRepository';
import { CursorStore } from '../services/sync/CursorStore';
import { KeywordStore } from '../services/keywords/KeywordStore';
import { authenticateToken } from '../middleware/auth';

export interface RouteDependencies {
  cursors: CursorStore;
  keywordStore: KeywordStore;
  classifications: ClassificationRepository;
  feedback: FeedbackRepository;
  jwtSecret: string;
}

/**
 * Operations API routes. Everything here requires a bearer token.
 */
export function createRoutes(deps: RouteDependencies): Router {
  const router = Router();

  const complaintController = new ComplaintController(deps.classifications, deps.feedback);
  const operationsController = new OperationsController(deps.cursors, deps.keywordStore, deps.feedback);

  router.use(authenticateToken(deps.jwtSecret));

  // Sync state
  router.get('/sync/status', operationsController.getSyncStatus.bind(operationsController));
  router.post('/sync/:mailboxId/reset', operationsController.resetCursor.bind(operationsController));

  // Classifications and feedback
  router.get('/classifications/:mailboxId/:messageId', complaintController.getClassification.bind(complaintController));
  router.post('/feedback', complaintController.submitFeedback.bind(complaintController));

  // Keywords
  router.get('/keywords', operationsController.getKeywordState.bind(operationsController));
  router.post('/keywords/reload', operationsController.reloadKeywords.bind(operationsController));

  return router;
}
