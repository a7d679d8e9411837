import cron from 'node-cron';
import { ComplaintScheduler, FeedbackRunner, MailboxProcessor } from '../../../services/scheduler/ComplaintScheduler';
import { FeedbackPassResult } from '../../../services/feedback/FeedbackLoop';
import { MailboxPassResult } from '../../../services/processing/ComplaintProcessor';

jest.mock('node-cron', () => ({
  __esModule: true,
  default: {
    schedule: jest.fn(() => ({ stop: jest.fn() }))
  }
}));

function passResult(mailboxId: string): MailboxPassResult {
  return {
    mailboxId,
    mode: 'delta',
    processed: 0,
    complaints: 0,
    forwarded: 0,
    skipped: 0,
    failed: 0,
    committed: true,
    errors: []
  };
}

function feedbackResult(kind: FeedbackPassResult['kind']): FeedbackPassResult {
  return { kind, collected: 0, processed: 0, adjusted: 0, candidates: 0, errors: [] };
}

describe('ComplaintScheduler', () => {
  const options = {
    mailboxes: ['support@example.com', 'billing@example.com'],
    intervals: { mainLoop: '10s', fpFeedbackLoop: '5m', fnFeedbackLoop: '1h' },
    batchDeadlineMs: 60000
  };

  let processMailbox: jest.Mock<Promise<MailboxPassResult>, [string, AbortSignal?]>;
  let run: jest.Mock<Promise<FeedbackPassResult>, [FeedbackPassResult['kind'], AbortSignal?]>;
  let scheduler: ComplaintScheduler;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    jest.mocked(cron.schedule).mockClear();
    processMailbox = jest.fn<Promise<MailboxPassResult>, [string, AbortSignal?]>(async mailboxId => passResult(mailboxId));
    run = jest.fn<Promise<FeedbackPassResult>, [FeedbackPassResult['kind'], AbortSignal?]>(async kind => feedbackResult(kind));
    const processor: MailboxProcessor = { processMailbox };
    const feedbackLoop: FeedbackRunner = { run };
    scheduler = new ComplaintScheduler(processor, feedbackLoop, options);
  });

  afterEach(async () => {
    await scheduler.stop();
    jest.restoreAllMocks();
  });

  it('should schedule every loop from its interval', () => {
    scheduler.start();

    expect(jest.mocked(cron.schedule).mock.calls.map(call => call[0])).toEqual([
      '*/10 * * * * *',
      '0 */5 * * * *',
      '0 0 */1 * * *'
    ]);
  });

  it('should process every mailbox on a main loop run', async () => {
    const results = await scheduler.runMainLoop();

    expect(results.map(result => result.mailboxId)).toEqual(options.mailboxes);
    expect(processMailbox).toHaveBeenCalledTimes(2);
    expect(processMailbox.mock.calls[0][1]).toBeInstanceOf(AbortSignal);
  });

  it('should run the requested feedback loop', async () => {
    await scheduler.trigger('false_negative');

    expect(run).toHaveBeenCalledWith('false_negative', expect.any(AbortSignal));
    expect(processMailbox).not.toHaveBeenCalled();
  });

  it('should skip a tick while the previous run is still going', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });
    processMailbox.mockImplementation(async (mailboxId: string) => {
      await gate;
      return passResult(mailboxId);
    });

    const first = scheduler.trigger('main');
    const second = scheduler.trigger('main');

    expect(second).toBe(first);
    expect(scheduler.isRunning('main')).toBe(true);

    release();
    await first;

    expect(processMailbox).toHaveBeenCalledTimes(2);
    expect(scheduler.isRunning('main')).toBe(false);
  });

  it('should log a failed run instead of rejecting', async () => {
    run.mockRejectedValueOnce(new Error('database is locked'));

    await expect(scheduler.trigger('false_positive')).resolves.toBeUndefined();
    expect(console.error).toHaveBeenCalledWith('❌ [FP] run failed: database is locked');
  });

  it('should abort a mailbox pass that runs past the deadline', async () => {
    const quick = new ComplaintScheduler({ processMailbox }, { run }, { ...options, batchDeadlineMs: 20 });
    processMailbox.mockImplementation((mailboxId: string, signal?: AbortSignal) => new Promise(resolve => {
      signal?.addEventListener('abort', () => resolve({ ...passResult(mailboxId), committed: false }));
    }));

    const results = await quick.runMainLoop();

    expect(results.every(result => !result.committed)).toBe(true);
    await quick.stop();
  });

  it('should abort a feedback pass that runs past the deadline so later ticks can run', async () => {
    const quick = new ComplaintScheduler({ processMailbox }, { run }, { ...options, batchDeadlineMs: 20 });
    run.mockImplementationOnce((kind, signal?: AbortSignal) => new Promise(resolve => {
      signal?.addEventListener('abort', () => resolve(feedbackResult(kind)));
    }));

    await quick.trigger('false_positive');
    expect(quick.isRunning('false_positive')).toBe(false);
    expect(run.mock.calls[0][1]?.aborted).toBe(true);

    await quick.trigger('false_positive');
    expect(run).toHaveBeenCalledTimes(2);
    await quick.stop();
  });

  it('should stop its cron tasks and abort in-flight work', async () => {
    scheduler.start();
    let seen: AbortSignal | undefined;
    processMailbox.mockImplementation((mailboxId: string, signal?: AbortSignal) => new Promise(resolve => {
      seen = signal;
      signal?.addEventListener('abort', () => resolve(passResult(mailboxId)));
    }));

    const inFlight = scheduler.trigger('main');
    await scheduler.stop();
    await inFlight;

    expect(seen?.aborted).toBe(true);
    for (const result of jest.mocked(cron.schedule).mock.results) {
      expect(result.value.stop).toHaveBeenCalled();
    }

    await scheduler.trigger('main');
    expect(processMailbox).toHaveBeenCalledTimes(2);
  });
});
