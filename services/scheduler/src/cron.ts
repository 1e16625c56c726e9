import cron, { type ScheduledTask } from 'node-cron';

import { describeError } from './errors.js';
import { logger } from './logger.js';
import type { Repository } from './repository.js';
import type { Publisher } from './services/publisher.js';

export const INTERRUPTED_MESSAGE = 'Publish attempt interrupted before completion';

export interface PublishSchedulerOptions {
  intervalSeconds: number;
  batchSize: number;
  timezone?: string;
  now?: () => Date;
}

export type TickOutcome =
  | { postId: string; status: 'published'; remoteMediaId: string | null }
  | { postId: string; status: 'failed'; error: string };

export interface TickResult {
  startedAt: Date;
  claimed: number;
  published: number;
  failed: number;
  outcomes: TickOutcome[];
}

export interface SchedulerStatus {
  running: boolean;
  intervalSeconds: number;
  ticksInFlight: number;
  lastTick: Omit<TickResult, 'outcomes'> | null;
}

/**
 * Promotes due scheduled posts into the publishing pipeline on a node-cron
 * cadence. Each tick claims a batch and runs the attempts in parallel.
 */
export class PublishScheduler {
  private task: ScheduledTask | null = null;
  private ticksInFlight = 0;
  private lastTick: TickResult | null = null;
  private readonly now: () => Date;

  constructor(
    private readonly repository: Repository,
    private readonly publisher: Pick<Publisher, 'runClaimed'>,
    private readonly options: PublishSchedulerOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Fails posts a previous process left in `publishing`, then starts the job.
   */
  start(): void {
    if (this.task) {
      return;
    }

    const recovered = this.repository.failInterrupted(INTERRUPTED_MESSAGE, this.now());
    if (recovered > 0) {
      logger.warn({ recovered }, 'Marked interrupted publish attempts as failed');
    }

    const expression = `*/${this.options.intervalSeconds} * * * * *`;
    this.task = cron.schedule(
      expression,
      () => {
        void this.runTick();
      },
      { timezone: this.options.timezone }
    );
    logger.info({ expression, batchSize: this.options.batchSize }, 'Publish scheduler started');
  }

  stop(): void {
    if (!this.task) {
      return;
    }
    this.task.stop();
    this.task = null;
    logger.info('Publish scheduler stopped');
  }

  /** Claims posts due at `now` and waits for every claimed attempt to settle. */
  async tick(now: Date = this.now()): Promise<TickResult> {
    const claimed = this.repository.claimDuePosts(now, this.options.batchSize);
    if (claimed.length > 0) {
      logger.info({ count: claimed.length }, 'Claimed due posts');
    }

    const settled = await Promise.allSettled(claimed.map((post) => this.publisher.runClaimed(post)));
    const outcomes = settled.map((result, index): TickOutcome => {
      const postId = claimed[index]?.id ?? 'unknown';
      if (result.status === 'fulfilled') {
        return { postId, status: 'published', remoteMediaId: result.value.remoteMediaId };
      }
      const error = describeError(result.reason);
      logger.error({ postId, error }, 'Scheduled publish failed');
      return { postId, status: 'failed', error };
    });

    const published = outcomes.filter((outcome) => outcome.status === 'published').length;
    const result: TickResult = {
      startedAt: now,
      claimed: claimed.length,
      published,
      failed: outcomes.length - published,
      outcomes,
    };
    if (result.claimed > 0) {
      logger.info({ claimed: result.claimed, published: result.published, failed: result.failed }, 'Scheduler tick finished');
    }
    return result;
  }

  /** Cron entry point; a failing tick is logged and the job keeps running. */
  async runTick(): Promise<TickResult | undefined> {
    this.ticksInFlight += 1;
    try {
      const result = await this.tick();
      this.lastTick = result;
      return result;
    } catch (error) {
      logger.error({ error: describeError(error) }, 'Scheduler tick failed');
      return undefined;
    } finally {
      this.ticksInFlight -= 1;
    }
  }

  getStatus(): SchedulerStatus {
    const lastTick = this.lastTick
      ? {
          startedAt: this.lastTick.startedAt,
          claimed: this.lastTick.claimed,
          published: this.lastTick.published,
          failed: this.lastTick.failed,
        }
      : null;
    return {
      running: this.task !== null,
      intervalSeconds: this.options.intervalSeconds,
      ticksInFlight: this.ticksInFlight,
      lastTick,
    };
  }
}
