/**
 * Nightly Scheduler Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import pino from 'pino';
import { NightlyScheduler, msUntilNextRun } from '../scheduler.js';

const logger = pino({ level: 'silent' });

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('msUntilNextRun', () => {
  it('counts forward to later the same day', () => {
    expect(msUntilNextRun(new Date(2024, 0, 15, 21, 0, 0), 22, 0)).toBe(3_600_000);
  });

  it('rolls over to the next day once the time has passed', () => {
    expect(msUntilNextRun(new Date(2024, 0, 15, 23, 30, 0), 22, 0)).toBe(81_000_000);
  });

  it('never returns zero at the exact minute', () => {
    expect(msUntilNextRun(new Date(2024, 0, 15, 22, 0, 0), 22, 0)).toBe(86_400_000);
  });
});

describe('NightlyScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(2024, 0, 15, 21, 0, 0));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs after the start-up delay and then nightly', async () => {
    const job = vi.fn(async () => undefined);
    const scheduler = new NightlyScheduler({ hour: 22, minute: 0, startupDelayMs: 10_000, job, logger });

    scheduler.start();
    expect(scheduler.getStatus().nextRunAt).toEqual(new Date(2024, 0, 15, 22, 0, 0));

    await vi.advanceTimersByTimeAsync(9_999);
    expect(job).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(job).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(3_590_000);
    expect(job).toHaveBeenCalledTimes(2);
    expect(scheduler.getStatus()).toMatchObject({
      enabled: true,
      running: false,
      nextRunAt: new Date(2024, 0, 16, 22, 0, 0),
      lastRunAt: new Date(2024, 0, 15, 22, 0, 0),
    });

    await scheduler.stop();
  });

  it('skips a trigger while a run is in progress', async () => {
    const gate = deferred();
    const job = vi.fn(() => gate.promise);
    const scheduler = new NightlyScheduler({ hour: 22, minute: 0, startupDelayMs: -1, job, logger });

    const first = scheduler.trigger('manual');
    expect(scheduler.getStatus().running).toBe(true);
    expect(await scheduler.trigger('manual')).toBe(false);

    gate.resolve();
    expect(await first).toBe(true);
    expect(job).toHaveBeenCalledTimes(1);
    expect(scheduler.getStatus().running).toBe(false);
  });

  it('waits for the running job on stop', async () => {
    const gate = deferred();
    const job = vi.fn(() => gate.promise);
    const scheduler = new NightlyScheduler({ hour: 22, minute: 0, startupDelayMs: 0, job, logger });

    scheduler.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(job).toHaveBeenCalledTimes(1);

    let stopped = false;
    const stopping = scheduler.stop().then(() => {
      stopped = true;
    });
    await vi.advanceTimersByTimeAsync(0);
    expect(stopped).toBe(false);

    gate.resolve();
    await stopping;
    expect(stopped).toBe(true);
    expect(scheduler.getStatus()).toMatchObject({ enabled: false, nextRunAt: null });

    await vi.advanceTimersByTimeAsync(86_400_000);
    expect(job).toHaveBeenCalledTimes(1);
  });

  it('survives a failing job', async () => {
    const job = vi.fn(async () => {
      throw new Error('ledger down');
    });
    const scheduler = new NightlyScheduler({ hour: 22, minute: 0, startupDelayMs: -1, job, logger });

    expect(await scheduler.trigger('manual')).toBe(true);
    expect(await scheduler.trigger('manual')).toBe(true);
    expect(job).toHaveBeenCalledTimes(2);
  });
});
