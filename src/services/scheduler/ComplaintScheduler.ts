import cron, { ScheduledTask } from 'node-cron';
import { errorMessage } from '../../models/errors';
import { FeedbackKind } from '../../types/models';
import { intervalToCron } from '../../utils/duration';
import { linkSignals } from '../../utils/retry';
import { FeedbackLoop, FeedbackPassResult } from '../feedback/FeedbackLoop';
import { ComplaintProcessor, MailboxPassResult } from '../processing/ComplaintProcessor';

export interface SchedulerOptions {
  mailboxes: string[];
  intervals: {
    mainLoop: string;
    fpFeedbackLoop: string;
    fnFeedbackLoop: string;
  };
  batchDeadlineMs: number;
}

export type TaskName = 'main' | 'false_positive' | 'false_negative';

export type MailboxProcessor = Pick<ComplaintProcessor, 'processMailbox'>;
export type FeedbackRunner = Pick<FeedbackLoop, 'run'>;

/**
 * Drives the main loop and both feedback loops on their own cron
 * schedules. A task that is still running when its next tick fires is
 * skipped for that tick.
 */
export class ComplaintScheduler {
  private tasks: ScheduledTask[] = [];
  private running = new Map<TaskName, Promise<void>>();
  private shutdown = new AbortController();

  constructor(
    private processor: MailboxProcessor,
    private feedbackLoop: FeedbackRunner,
    private options: SchedulerOptions
  ) {}

  start(): void {
    const { intervals } = this.options;
    this.schedule('main', intervalToCron(intervals.mainLoop));
    this.schedule('false_positive', intervalToCron(intervals.fpFeedbackLoop));
    this.schedule('false_negative', intervalToCron(intervals.fnFeedbackLoop));

    console.log(`✅ Scheduler started: main every ${intervals.mainLoop}, FP every ${intervals.fpFeedbackLoop}, FN every ${intervals.fnFeedbackLoop}`);
  }

  /**
   * Starts a task unless it is already running. Resolves when the run ends.
   */
  trigger(name: TaskName): Promise<void> {
    const inFlight = this.running.get(name);
    if (inFlight) {
      console.log(`⏭️ [${label(name)}] previous run still in progress, skipping`);
      return inFlight;
    }

    const run = this.execute(name)
      .catch(error => {
        console.error(`❌ [${label(name)}] run failed: ${errorMessage(error)}`);
      })
      .finally(() => {
        this.running.delete(name);
      });

    this.running.set(name, run);
    return run;
  }

  isRunning(name: TaskName): boolean {
    return this.running.has(name);
  }

  /**
   * One pass over every mailbox, concurrently, each under the batch deadline
   */
  async runMainLoop(): Promise<MailboxPassResult[]> {
    return Promise.all(this.options.mailboxes.map(mailboxId => this.runMailbox(mailboxId)));
  }

  /**
   * One feedback pass over every mailbox, under the batch deadline
   */
  async runFeedbackLoop(kind: FeedbackKind): Promise<FeedbackPassResult> {
    const deadline = AbortSignal.timeout(this.options.batchDeadlineMs);
    const { signal, dispose } = linkSignals(this.shutdown.signal, deadline);
    try {
      return await this.feedbackLoop.run(kind, signal);
    } finally {
      dispose();
    }
  }

  /**
   * Stops scheduling, aborts in-flight work and waits for it to settle
   */
  async stop(): Promise<void> {
    for (const task of this.tasks) {
      task.stop();
    }
    this.tasks = [];

    this.shutdown.abort(new Error('Scheduler stopped'));
    await Promise.allSettled([...this.running.values()]);
    console.log('✅ Scheduler stopped');
  }

  private schedule(name: TaskName, expression: string): void {
    const task = cron.schedule(expression, () => {
      this.trigger(name).catch(error => {
        console.error(`❌ [${label(name)}] ${errorMessage(error)}`);
      });
    });
    this.tasks.push(task);
  }

  private async execute(name: TaskName): Promise<void> {
    if (this.shutdown.signal.aborted) return;

    if (name === 'main') {
      await this.runMainLoop();
    } else {
      await this.runFeedbackLoop(name);
    }
  }

  private async runMailbox(mailboxId: string): Promise<MailboxPassResult> {
    const deadline = AbortSignal.timeout(this.options.batchDeadlineMs);
    const { signal, dispose } = linkSignals(this.shutdown.signal, deadline);
    try {
      return await this.processor.processMailbox(mailboxId, signal);
    } finally {
      dispose();
    }
  }
}

function label(name: TaskName): string {
  switch (name) {
    case 'main':
      return 'MAIN';
    case 'false_positive':
      return 'FP';
    default:
      return 'FN';
  }
}
