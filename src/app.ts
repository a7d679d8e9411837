import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { createRoutes, RouteDependencies } from './routes';

/**
 * Builds the operations API
 */
export function createApp(deps: RouteDependencies): express.Express {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  // Health check endpoint
  app.get('/health', (req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: 'complaint-router',
      version: '1.0.0'
    });
  });

  app.use('/api', createRoutes(deps));

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      error: 'Not Found',
      message: `Route ${req.method} ${req.originalUrl} not found`
    });
  });

  // Error handler
  app.use((error: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    if (isClientError(error)) {
      res.status(400).json({
        error: 'Bad Request',
        message: 'Malformed request body'
      });
      return;
    }
    console.error('❌ Unhandled error:', error);
    res.status(500).json({
      error: 'Internal Server Error',
      message: 'An unexpected error occurred'
    });
  });

  return app;
}

// body-parser marks malformed payloads with status 400
function isClientError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'status' in error && error.status === 400;
}
