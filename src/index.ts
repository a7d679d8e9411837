import dotenv from 'dotenv';
import path from 'path';
import { Server } from 'http';
import { createApp } from './app';
import { loadConfig, AppConfig } from './config/settings';
import { ConfigError, closeDatabase, errorMessage, getDatabase, runMigrations } from './models';
import { ClassificationRepository } from './repositories/ClassificationRepository';
import { FeedbackRepository } from './repositories/FeedbackRepository';
import { ServiceAccountAuth } from './services/auth';
import { GmailProvider } from './services/email/GmailProvider';
import { RetryingMailProvider } from './services/email/RetryingMailProvider';
import { FeedbackLoop } from './services/feedback/FeedbackLoop';
import { KeywordStore } from './services/keywords/KeywordStore';
import { ComplaintProcessor } from './services/processing/ComplaintProcessor';
import { ComplaintScheduler } from './services/scheduler/ComplaintScheduler';
import { ScoringEngine } from './services/scoring/ScoringEngine';
import { HttpSentimentBackend } from './services/sentiment/HttpSentimentBackend';
import { OpenAISentimentBackend } from './services/sentiment/OpenAISentimentBackend';
import { SentimentAdapter, SentimentBackend } from './services/sentiment/SentimentAdapter';
import { CursorStore } from './services/sync/CursorStore';
import { SyncCursorManager } from './services/sync/SyncCursorManager';

// Load environment variables
dotenv.config();

function createSentimentBackend(config: AppConfig): SentimentBackend {
  if (config.sentiment.backend === 'http') {
    if (!config.sentiment.endpoint) {
      throw new ConfigError('sentiment.endpoint is required for the http sentiment backend');
    }
    return new HttpSentimentBackend(config.sentiment.endpoint, process.env.SENTIMENT_ENDPOINT_TOKEN);
  }
  return new OpenAISentimentBackend(process.env.OPENAI_API_KEY, config.sentiment.model);
}

async function startServer(): Promise<void> {
  console.log('🔧 Initializing services...');

  const configPath = process.env.CONFIG_PATH || path.join(process.cwd(), 'config', 'config.json');
  const config = await loadConfig(configPath);

  const jwtSecret = process.env.JWT_SECRET;
  if (config.api.enabled && !jwtSecret) {
    throw new ConfigError('JWT_SECRET environment variable is required when the operations API is enabled');
  }

  console.log('📊 Setting up database...');
  const db = await getDatabase(config.deltaTokenPath);
  await runMigrations(db);

  const cursors = new CursorStore(db);
  const released = await cursors.releaseStaleLocks();
  if (released > 0) {
    console.warn(`⚠️ Released ${released} sync locks left by a previous run`);
  }

  const classifications = new ClassificationRepository(db);
  const feedback = new FeedbackRepository(db);
  const keywordStore = await KeywordStore.create(config.keywordFiles, await feedback.loadAdjustments());

  const auth = ServiceAccountAuth.fromEnvironment();
  for (const mailboxId of config.monitoredMailboxes) {
    await auth.verifyAccess(mailboxId);
  }
  const provider = new RetryingMailProvider(GmailProvider.withServiceAccount(auth), config.providerRetry);

  const sentiment = new SentimentAdapter(createSentimentBackend(config), config.sentimentRetry, config.sentimentFallback);
  const engine = new ScoringEngine(config.weights, config.exclusions, sentiment);

  const syncManager = new SyncCursorManager(provider, cursors, {
    topEmails: config.topEmails,
    startDate: config.emailFilter.startDate
  });
  const processor = new ComplaintProcessor(syncManager, cursors, provider, engine, keywordStore, classifications, {
    distributionListEmail: config.distributionListEmail,
    deleteOriginal: config.deleteOriginal,
    requireContiguousProgress: config.requireContiguousProgress
  });
  const feedbackLoop = new FeedbackLoop(provider, classifications, feedback, keywordStore, engine, {
    ...config.feedback,
    mailboxes: config.monitoredMailboxes,
    distributionListEmail: config.distributionListEmail,
    topEmails: config.topEmails
  });

  const scheduler = new ComplaintScheduler(processor, feedbackLoop, {
    mailboxes: config.monitoredMailboxes,
    intervals: config.schedulingIntervals,
    batchDeadlineMs: config.batchDeadlineMs
  });
  scheduler.start();

  let server: Server | null = null;
  if (config.api.enabled && jwtSecret) {
    const app = createApp({ cursors, keywordStore, classifications, feedback, jwtSecret });
    const port = Number(process.env.PORT) || config.api.port;
    server = app.listen(port, () => {
      console.log(`🚀 Operations API running on port ${port}`);
      console.log(`🏥 Health check: http://localhost:${port}/health`);
    });
  }

  const shutdown = async (signal: string) => {
    console.log(`🔄 ${signal} received, shutting down...`);
    await scheduler.stop();
    if (server) {
      await new Promise<void>(resolve => server?.close(() => resolve()));
    }
    await closeDatabase();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch(error => {
        console.error(`❌ Shutdown failed: ${errorMessage(error)}`);
        process.exit(1);
      });
    });
  }

  console.log(`📧 Monitoring ${config.monitoredMailboxes.join(', ')}`);
}

startServer().catch(error => {
  if (error instanceof ConfigError) {
    console.error(`❌ Configuration error: ${error.message}`);
    for (const detail of error.details) {
      console.error(`   - ${detail}`);
    }
  } else {
    console.error('❌ Failed to start:', error);
  }
  process.exit(1);
});
