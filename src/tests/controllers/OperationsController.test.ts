import request from 'supertest';
import express from 'express';
import jwt from 'jsonwebtoken';
import os from 'os';
import path from 'path';
import { promises as fs } from 'fs';
import { Database } from 'sqlite';
import { createApp } from '../../app';
import { ClassificationRepository } from '../../repositories/ClassificationRepository';
import { FeedbackRepository } from '../../repositories/FeedbackRepository';
import { CursorStore } from '../../services/sync/CursorStore';
import { KeywordSources, KeywordStore } from '../../services/keywords/KeywordStore';
import { createTestDatabase, makeKeywords } from '../fixtures';

describe('OperationsController', () => {
  let app: express.Express;
  let db: Database;
  let dir: string;
  let sources: KeywordSources;
  let cursors: CursorStore;
  let feedback: FeedbackRepository;

  const JWT_SECRET = 'test-secret';
  const token = jwt.sign({ sub: 'operator-1' }, JWT_SECRET);

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    db = await createTestDatabase();
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'keywords-'));
    sources = {
      complaint: path.join(dir, 'complaint.txt'),
      subject: path.join(dir, 'subject.txt'),
      urgency: path.join(dir, 'urgency.txt'),
      negation: path.join(dir, 'negation.txt')
    };
    cursors = new CursorStore(db);
    feedback = new FeedbackRepository(db);
    app = createApp({
      cursors,
      keywordStore: new KeywordStore(sources, makeKeywords()),
      classifications: new ClassificationRepository(db),
      feedback,
      jwtSecret: JWT_SECRET
    });
  });

  afterEach(async () => {
    await db.close();
    await fs.rm(dir, { recursive: true, force: true });
    jest.restoreAllMocks();
  });

  describe('GET /api/sync/status', () => {
    it('should report every mailbox and the failing ones', async () => {
      await cursors.advance('support@example.com', '100', new Date('2024-01-01T10:00:00.000Z'), { processed: 5 });
      await cursors.tryAcquireSyncLock('billing@example.com');
      await cursors.releaseSyncLock('billing@example.com', 'error', 'Sync failed for billing@example.com: quota');

      const response = await request(app)
        .get('/api/sync/status')
        .set('Authorization', `Bearer ${token}`)
        .expect(200);

      expect(response.body.statistics).toEqual({
        totalMailboxes: 2,
        mailboxesWithoutCursor: 1,
        mailboxesSyncing: 0,
        mailboxesWithErrors: 1,
        totalProcessed: 5
      });
      expect(response.body.errors).toEqual([
        { mailboxId: 'billing@example.com', lastError: 'Sync failed for billing@example.com: quota' }
      ]);
      expect(response.body.mailboxes.map((mailbox: { mailboxId: string }) => mailbox.mailboxId))
        .toEqual(['billing@example.com', 'support@example.com']);
      expect(response.body.pendingFeedback).toEqual({ false_positive: 0, false_negative: 0 });
      expect(response.body.keywordGeneration).toBe(1);
    });
  });

  describe('POST /api/sync/:mailboxId/reset', () => {
    it('should clear the cursor', async () => {
      await cursors.advance('support@example.com', '100', new Date());

      await request(app)
        .post('/api/sync/support@example.com/reset')
        .set('Authorization', `Bearer ${token}`)
        .expect(200);

      const cursor = await cursors.get('support@example.com');
      expect(cursor?.cursor).toBeNull();
      expect(cursor?.cursorAt).toBeNull();
    });

    it('should return 404 for a mailbox with no sync state', async () => {
      await request(app)
        .post('/api/sync/unknown@example.com/reset')
        .set('Authorization', `Bearer ${token}`)
        .expect(404);
    });
  });

  describe('GET /api/keywords', () => {
    it('should list learned multipliers and candidate terms', async () => {
      await feedback.saveAdjustments([
        { category: 'complaint', term: 'refund', multiplier: 0.9, updatedAt: new Date('2024-01-01T00:00:00.000Z') }
      ]);
      await feedback.recordCandidates(['firmware'], new Date('2024-01-02T00:00:00.000Z'));

      const response = await request(app)
        .get('/api/keywords')
        .set('Authorization', `Bearer ${token}`)
        .expect(200);

      expect(response.body).toEqual({
        generation: 1,
        adjustments: [{ category: 'complaint', term: 'refund', multiplier: 0.9, updatedAt: '2024-01-01T00:00:00.000Z' }],
        candidates: [{ term: 'firmware', occurrences: 1, lastSeenAt: '2024-01-02T00:00:00.000Z' }]
      });
    });
  });

  describe('POST /api/keywords/reload', () => {
    it('should load the keyword files into a new generation', async () => {
      await fs.writeFile(sources.complaint, '# complaint terms\nbroken\nnot working\n');
      await fs.writeFile(sources.subject, 'complaint\n');
      await fs.writeFile(sources.urgency, 'urgent\nasap\n');
      await fs.writeFile(sources.negation, 'not\n');

      const response = await request(app)
        .post('/api/keywords/reload')
        .set('Authorization', `Bearer ${token}`)
        .expect(200);

      expect(response.body).toEqual({
        generation: 2,
        counts: { complaint: 2, subject: 1, urgency: 2, negation: 1 }
      });
    });

    it('should keep the current keywords when a file is missing', async () => {
      const response = await request(app)
        .post('/api/keywords/reload')
        .set('Authorization', `Bearer ${token}`)
        .expect(500);

      expect(response.body.error).toBe('Keyword reload failed');
      expect(response.body.message).toMatch(/^Keyword file not found or unreadable: /);

      const status = await request(app)
        .get('/api/sync/status')
        .set('Authorization', `Bearer ${token}`)
        .expect(200);
      expect(status.body.keywordGeneration).toBe(1);
    });
  });
});
