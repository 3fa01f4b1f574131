/**
 * Nightly Scheduler
 * Runs a job shortly after start-up and then every day at a fixed local time.
 * A trigger that arrives while the job is still running is skipped.
 */

import type { Logger } from 'pino';
import { errorMessage } from '@stockbridge/integrations';
import type { SchedulerStatus } from './types.js';

export type TriggerReason = 'startup' | 'nightly' | 'manual';

export interface NightlySchedulerOptions {
  hour: number;
  minute: number;
  /** Negative disables the start-up run */
  startupDelayMs: number;
  job: () => Promise<unknown>;
  logger: Logger;
  now?: () => Date;
}

/**
 * Milliseconds from `now` until the next local hh:mm, never zero
 */
export function msUntilNextRun(now: Date, hour: number, minute: number): number {
  const next = new Date(now.getTime());
  next.setHours(hour, minute, 0, 0);
  if (next.getTime() <= now.getTime()) {
    next.setDate(next.getDate() + 1);
  }
  return next.getTime() - now.getTime();
}

export class NightlyScheduler {
  private readonly options: NightlySchedulerOptions;
  private readonly logger: Logger;
  private readonly now: () => Date;

  private startupTimer: NodeJS.Timeout | null = null;
  private nightlyTimer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private enabled = false;
  private nextRunAt: Date | null = null;
  private lastRunAt: Date | null = null;

  constructor(options: NightlySchedulerOptions) {
    this.options = options;
    this.logger = options.logger.child({ component: 'scheduler' });
    this.now = options.now ?? (() => new Date());
  }

  start(): void {
    if (this.enabled) {
      return;
    }
    this.enabled = true;

    if (this.options.startupDelayMs >= 0) {
      this.startupTimer = setTimeout(() => {
        this.startupTimer = null;
        void this.trigger('startup');
      }, this.options.startupDelayMs);
    }

    this.scheduleNext();
  }

  /**
   * Clear pending timers and wait for a running job to finish
   */
  async stop(): Promise<void> {
    this.enabled = false;
    if (this.startupTimer) {
      clearTimeout(this.startupTimer);
      this.startupTimer = null;
    }
    if (this.nightlyTimer) {
      clearTimeout(this.nightlyTimer);
      this.nightlyTimer = null;
    }
    this.nextRunAt = null;

    if (this.inFlight) {
      await this.inFlight;
    }
  }

  /**
   * Run the job now unless it is already running. Resolves to whether it ran.
   */
  async trigger(reason: TriggerReason): Promise<boolean> {
    if (this.inFlight) {
      this.logger.warn({ reason }, 'Previous run still in progress, skipping');
      return false;
    }

    this.lastRunAt = this.now();
    this.logger.info({ reason }, 'Scheduled run starting');
    this.inFlight = this.execute(reason);
    try {
      await this.inFlight;
    } finally {
      this.inFlight = null;
    }
    return true;
  }

  getStatus(): SchedulerStatus {
    return {
      enabled: this.enabled,
      running: this.inFlight !== null,
      nextRunAt: this.nextRunAt,
      lastRunAt: this.lastRunAt,
    };
  }

  private scheduleNext(): void {
    const delay = msUntilNextRun(this.now(), this.options.hour, this.options.minute);
    this.nextRunAt = new Date(this.now().getTime() + delay);
    this.logger.debug({ nextRunAt: this.nextRunAt.toISOString() }, 'Next nightly run scheduled');

    this.nightlyTimer = setTimeout(() => {
      this.nightlyTimer = null;
      this.scheduleNext();
      void this.trigger('nightly');
    }, delay);
  }

  private async execute(reason: TriggerReason): Promise<void> {
    try {
      await this.options.job();
    } catch (error) {
      this.logger.error({ reason, error: errorMessage(error) }, 'Scheduled run failed');
    }
  }
}

export function createNightlyScheduler(options: NightlySchedulerOptions): NightlyScheduler {
  return new NightlyScheduler(options);
}
