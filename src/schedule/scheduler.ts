/**
 * Scheduler: node-cron job that republishes the feed periodically.
 * Used by `npo-feed schedule` and `npo-feed serve --schedule`.
 */

import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import { ConfigError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { PipelineResult } from '../pipeline/run.js';

export type PipelineRunner = () => Promise<PipelineResult>;

export interface SchedulerOptions {
  cron: string;
  run: PipelineRunner;
  /** Run once immediately on start, before the first cron tick. Defaults to true. */
  runOnStart?: boolean;
  /** Aborting the signal stops the scheduler. */
  signal?: AbortSignal;
}

export class FeedScheduler {
  private task: ScheduledTask | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(private readonly options: SchedulerOptions) {}

  get active(): boolean {
    return this.task !== null;
  }

  start(): void {
    if (this.task) return;

    const { cron: expression, signal, runOnStart = true } = this.options;
    if (!cron.validate(expression)) {
      throw new ConfigError(`Invalid update_cron expression: ${expression}`, { cron: expression });
    }
    if (signal?.aborted) return;

    this.task = cron.schedule(expression, () => {
      void this.tick();
    });
    signal?.addEventListener('abort', () => this.stop(), { once: true });

    logger.info({ update_cron: expression }, 'Scheduler started');

    if (runOnStart) void this.tick();
  }

  /**
   * One pipeline run. Skipped while the previous run is still going, since
   * runs share the cache and feed files without locking.
   */
  async tick(): Promise<void> {
    if (this.inFlight) {
      logger.warn('Previous feed update still running, skipping this tick');
      return;
    }

    this.inFlight = this.runOnce();
    try {
      await this.inFlight;
    } finally {
      this.inFlight = null;
    }
  }

  /** Resolves once the in-flight run, if any, has finished. */
  async idle(): Promise<void> {
    await this.inFlight;
  }

  stop(): void {
    if (!this.task) return;
    this.task.stop();
    this.task = null;
    logger.info('Scheduler stopped');
  }

  private async runOnce(): Promise<void> {
    logger.info('Updating feed');
    try {
      const result = await this.options.run();
      if (result.outputPath) {
        logger.info(
          { origin: result.origin, count: result.items.length, durationMs: result.durationMs },
          'Feed updated successfully',
        );
      } else {
        logger.warn({ origin: result.origin }, 'Feed update produced no programs');
      }
    } catch (err) {
      logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Feed update failed');
    }
  }
}
