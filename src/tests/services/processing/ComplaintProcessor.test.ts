import { Database } from 'sqlite';
import {
  ComplaintProcessor, ProcessorOptions, buildForward, extractMarkedId, processingMarker
} from '../../../services/processing/ComplaintProcessor';
import { ClassificationRepository } from '../../../repositories/ClassificationRepository';
import { KeywordStore } from '../../../services/keywords/KeywordStore';
import { ScoringEngine } from '../../../services/scoring/ScoringEngine';
import { CursorStore } from '../../../services/sync/CursorStore';
import { SyncCursorManager } from '../../../services/sync/SyncCursorManager';
import { SentimentUnavailable, TransientProviderError } from '../../../models/errors';
import { ExclusionRules, ScoringWeights } from '../../../types/models';
import {
  FakeMailProvider, FakeSentiment, createTestDatabase, makeKeywords, makeMessage, makeWeights
} from '../../fixtures';

describe('ComplaintProcessor', () => {
  const mailbox = 'support@example.com';
  const keywordSources = {
    complaint: 'complaint.txt',
    subject: 'subject.txt',
    urgency: 'urgency.txt',
    negation: 'negation.txt'
  };

  let db: Database;
  let cursors: CursorStore;
  let classifications: ClassificationRepository;
  let provider: FakeMailProvider;
  let sentiment: FakeSentiment;

  const createProcessor = (
    options: Partial<ProcessorOptions> = {},
    weights: ScoringWeights = makeWeights(),
    exclusions: ExclusionRules = { from: [], subject: [] }
  ) => {
    const engine = new ScoringEngine(weights, exclusions, sentiment);
    const syncManager = new SyncCursorManager(provider, cursors, { topEmails: 50, startDate: null });
    return new ComplaintProcessor(
      syncManager,
      cursors,
      provider,
      engine,
      new KeywordStore(keywordSources, makeKeywords()),
      classifications,
      {
        distributionListEmail: 'complaints@example.com',
        deleteOriginal: false,
        requireContiguousProgress: true,
        ...options
      }
    );
  };

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    db = await createTestDatabase();
    cursors = new CursorStore(db);
    classifications = new ClassificationRepository(db);
    provider = new FakeMailProvider();
    sentiment = FakeSentiment.reading(0.9);
  });

  afterEach(async () => {
    await db.close();
    jest.restoreAllMocks();
  });

  it('should forward complaints and advance the cursor', async () => {
    const complaint = makeMessage({ subject: 'Service', body: 'I am unhappy about the outage' });
    const thanks = makeMessage({ body: 'Thanks for the help' });
    provider.deliver(complaint);
    provider.deliver(thanks);

    const result = await createProcessor().processMailbox(mailbox);

    expect(result).toEqual({
      mailboxId: mailbox,
      mode: 'full',
      processed: 2,
      complaints: 1,
      forwarded: 1,
      skipped: 0,
      failed: 0,
      committed: true,
      errors: []
    });
    expect(provider.forwarded).toHaveLength(1);
    expect(provider.forwarded[0].messageId).toBe(complaint.id);
    expect(provider.forwarded[0].forward).toMatchObject({
      to: 'complaints@example.com',
      subject: 'FW: Service',
      text: `X-Complaint-Processor: Processed-v1.0; ID=${complaint.id};\n\nI am unhappy about the outage`
    });

    const cursor = await cursors.get(mailbox);
    expect(cursor?.cursor).toBe(provider.currentCursor());
    expect(cursor?.status).toBe('idle');
    expect(cursor?.totalProcessed).toBe(2);

    const stored = await classifications.get(mailbox, complaint.id);
    expect(stored?.isComplaint).toBe(true);
    expect(stored?.forwardedAt).toBeInstanceOf(Date);
    expect((await classifications.get(mailbox, thanks.id))?.forwardedAt).toBeNull();
  });

  it('should not forward a complaint twice when a batch is replayed', async () => {
    provider.deliver(makeMessage({ body: 'I am unhappy about the outage' }));
    const processor = createProcessor();
    await processor.processMailbox(mailbox);

    await cursors.reset(mailbox);
    const replay = await processor.processMailbox(mailbox);

    expect(replay.mode).toBe('full');
    expect(replay.skipped).toBe(1);
    expect(replay.forwarded).toBe(0);
    expect(provider.forwarded).toHaveLength(1);
  });

  it('should only process new messages on the next pass', async () => {
    provider.deliver(makeMessage({ body: 'Thanks for the help' }));
    const processor = createProcessor();
    await processor.processMailbox(mailbox);

    const later = makeMessage({ body: 'The refund is broken' });
    provider.deliver(later);
    const result = await processor.processMailbox(mailbox);

    expect(result.mode).toBe('delta');
    expect(result.processed).toBe(1);
    expect(provider.forwarded.map(entry => entry.messageId)).toEqual([later.id]);
  });

  it('should not forward a complaint an operator returned to the mailbox', async () => {
    const complaint = makeMessage({ subject: 'Question', body: 'The refund is broken' });
    provider.deliver(complaint);
    const processor = createProcessor();
    await processor.processMailbox(mailbox);

    const returned = makeMessage({
      sender: 'operator@example.com',
      subject: 'FW: Question',
      body: provider.forwarded[0].forward.text
    });
    provider.deliver(returned);
    const result = await processor.processMailbox(mailbox);

    expect(result).toMatchObject({ mode: 'delta', processed: 1, skipped: 1, forwarded: 0, committed: true });
    expect(provider.forwarded.map(entry => entry.forward.subject)).toEqual(['FW: Question']);
    expect(await classifications.get(mailbox, returned.id)).toBeNull();
    expect(await processor.processMessage(returned)).toBe('feedback');
  });

  it('should hold the cursor when sentiment is unavailable and recover on the next pass', async () => {
    const gate = makeWeights({
      sentimentMode: 'gate',
      keywordThreshold: 0.5,
      sentimentBand: 0.2,
      bodyKeyword: 0.9,
      keywordSaturation: 4
    });
    sentiment = new FakeSentiment(new SentimentUnavailable('backend down', 3));
    const borderline = makeMessage({ body: 'unhappy about the outage' });
    provider.deliver(borderline);
    const processor = createProcessor({}, gate);

    const failed = await processor.processMailbox(mailbox);

    expect(failed.failed).toBe(1);
    expect(failed.committed).toBe(false);
    expect(failed.errors[0]).toContain(borderline.id);
    expect((await cursors.get(mailbox))?.cursor).toBeNull();
    expect(provider.forwarded).toEqual([]);

    sentiment.setOutcome({ score: 0.9, label: 'NEGATIVE', fallback: false });
    const recovered = await processor.processMailbox(mailbox);

    expect(recovered.forwarded).toBe(1);
    expect(recovered.committed).toBe(true);
  });

  it('should commit past failed fetches when contiguous progress is not required', async () => {
    const broken = makeMessage({ body: 'Thanks' });
    provider.deliver(broken);
    provider.failingFetches.add(broken.id);

    const strict = await createProcessor().processMailbox(mailbox);
    expect(strict.failed).toBe(1);
    expect(strict.committed).toBe(false);

    const lenient = await createProcessor({ requireContiguousProgress: false }).processMailbox(mailbox);
    expect(lenient.failed).toBe(1);
    expect(lenient.committed).toBe(true);
    expect(lenient.errors).toEqual([`Failed to fetch message ${broken.id}`]);
  });

  it('should skip a mailbox another pass is working on', async () => {
    provider.deliver(makeMessage({ body: 'I am unhappy about the outage' }));
    await cursors.tryAcquireSyncLock(mailbox);

    const result = await createProcessor().processMailbox(mailbox);

    expect(result.mode).toBe('skipped');
    expect(result.processed).toBe(0);
    expect(provider.windowRequests).toEqual([]);
  });

  it('should record a failed pass on the mailbox and release the lock', async () => {
    provider.failListing = new TransientProviderError('Gmail unavailable');

    const result = await createProcessor().processMailbox(mailbox);

    expect(result.committed).toBe(false);
    expect(result.errors).toEqual([`Sync failed for ${mailbox}: Gmail unavailable`]);
    const cursor = await cursors.get(mailbox);
    expect(cursor?.status).toBe('error');
    expect(cursor?.lastError).toBe(`Sync failed for ${mailbox}: Gmail unavailable`);
    await expect(cursors.tryAcquireSyncLock(mailbox)).resolves.toBe(true);
  });

  it('should stop cleanly when the pass is aborted', async () => {
    provider.deliver(makeMessage({ body: 'I am unhappy about the outage' }));
    const controller = new AbortController();
    controller.abort('deadline');

    const result = await createProcessor().processMailbox(mailbox, controller.signal);

    expect(result.committed).toBe(false);
    expect(result.errors).toEqual(['deadline']);
    expect((await cursors.get(mailbox))?.status).toBe('idle');
  });

  it('should trash forwarded originals when configured', async () => {
    const complaint = makeMessage({ body: 'I am unhappy about the outage' });
    provider.deliver(complaint);

    await createProcessor({ deleteOriginal: true }).processMailbox(mailbox);

    expect(provider.deleted).toEqual([{ mailboxId: mailbox, messageId: complaint.id }]);
  });

  it('should keep a forwarded complaint when trashing it fails', async () => {
    const complaint = makeMessage({ body: 'I am unhappy about the outage' });
    provider.deliver(complaint);
    provider.failDelete = new Error('insufficient permissions');

    const result = await createProcessor({ deleteOriginal: true }).processMailbox(mailbox);

    expect(result.forwarded).toBe(1);
    expect(result.failed).toBe(0);
    expect(result.committed).toBe(true);
    expect((await classifications.get(mailbox, complaint.id))?.forwardedAt).toBeInstanceOf(Date);
  });

  it('should record excluded messages without forwarding them', async () => {
    const automated = makeMessage({ sender: 'noreply@shop.example', body: 'Your refund is broken' });
    provider.deliver(automated);

    const processor = createProcessor({}, makeWeights(), { from: [/^(?:no-?reply@)/i], subject: [] });
    const outcome = await processor.processMessage(automated);

    expect(outcome).toBe('excluded');
    expect(provider.forwarded).toEqual([]);
    expect((await classifications.get(mailbox, automated.id))?.excludedBy).toBe('from');
  });

  describe('processing marker', () => {
    it('should find the original id in forwarded text', () => {
      expect(extractMarkedId(`FW: hello\n${processingMarker('18c2f0a9')}\n\nbody`)).toBe('18c2f0a9');
      expect(extractMarkedId('no marker here')).toBeNull();
    });

    it('should build HTML forwards with the marker on top', () => {
      const message = makeMessage({ id: 'm1', subject: 'Outage', metadata: { labels: [], htmlBody: '<p>Down again</p>' } });

      expect(buildForward(message, 'complaints@example.com')).toEqual({
        to: 'complaints@example.com',
        subject: 'FW: Outage',
        text: `X-Complaint-Processor: Processed-v1.0; ID=m1;\n\n${message.body}`,
        html: '<p>X-Complaint-Processor: Processed-v1.0; ID=m1;</p><p>Down again</p>',
        headers: { 'X-Complaint-Processor': 'Processed-v1.0; ID=m1' }
      });
    });
  });
});
