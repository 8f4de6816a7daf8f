/**
 * Dual-cadence scheduler.
 *
 * Each enabled job has its own next-run instant. The loop sleeps until the
 * earliest one, runs every due job one after another, persists each job's
 * status as soon as it finishes and rebuilds the index once per wake-up.
 * A job failure never stops the loop.
 */

import { setTimeout as delay } from 'timers/promises';
import { createJobContext, type JobKind, type JobStatusRecord, type Logger } from '@cinefeed/shared';
import { executeJob, type JobRunner } from './jobs/job.js';
import type { StatusStore } from './status.js';

export interface ScheduledJob {
  kind: JobKind;
  enabled: boolean;
  intervalSeconds: number;
  run: JobRunner;
}

export type LastSuccess = Record<JobKind, string | null>;

export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>;

export interface SchedulerOptions {
  runId: string;
  jobs: readonly ScheduledJob[];
  logger: Logger;
  status: StatusStore;
  rebuildIndex: (lastSuccess: LastSuccess) => Promise<void>;
  idleSeconds: number;
  now?: () => Date;
  sleep?: SleepFn;
}

/** Resolves early, without error, when the signal aborts. */
export async function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (!signal.aborted) throw error;
  }
}

export class Scheduler {
  private readonly nextRun = new Map<JobKind, number>();
  private readonly lastSuccess: LastSuccess = { catalog: null, channels: null };
  private readonly abort = new AbortController();
  private readonly now: () => Date;
  private readonly sleep: SleepFn;
  private stopped = false;

  constructor(private readonly options: SchedulerOptions) {
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? abortableSleep;

    // Enabled jobs are due immediately
    const start = this.now().getTime();
    for (const job of options.jobs) {
      if (job.enabled) this.nextRun.set(job.kind, start);
    }
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  nextRunAt(kind: JobKind): Date | undefined {
    const at = this.nextRun.get(kind);
    return at === undefined ? undefined : new Date(at);
  }

  lastSuccessAt(kind: JobKind): string | null {
    return this.lastSuccess[kind];
  }

  dueJobs(now: Date = this.now()): ScheduledJob[] {
    return this.options.jobs.filter((job) => {
      const at = this.nextRun.get(job.kind);
      return at !== undefined && now.getTime() >= at;
    });
  }

  /** Milliseconds until the earliest next run, or the idle interval when nothing is scheduled. */
  msUntilNextRun(now: Date = this.now()): number {
    if (this.nextRun.size === 0) return this.options.idleSeconds * 1000;
    const earliest = Math.min(...this.nextRun.values());
    return Math.max(0, earliest - now.getTime());
  }

  /**
   * Run the given jobs in order, regardless of their next-run instants.
   */
  async runJobs(jobs: readonly ScheduledJob[]): Promise<JobStatusRecord[]> {
    const { logger, runId, status } = this.options;
    const records: JobStatusRecord[] = [];

    for (const job of jobs) {
      if (this.stopped) break;

      const ctx = createJobContext(logger, runId, job.kind);
      const record = await executeJob(job.kind, ctx, job.run, {
        enabled: job.enabled,
        now: this.now,
        previousSuccessAt: this.lastSuccess[job.kind],
      });
      records.push(record);

      this.lastSuccess[job.kind] = record.lastSuccessAt;
      if (job.enabled) {
        this.nextRun.set(job.kind, Date.parse(record.finishedAt) + job.intervalSeconds * 1000);
      }

      try {
        await status.record(job.kind, record);
      } catch (error) {
        ctx.logger.error({ err: error }, 'status_write_failed');
      }
    }

    if (records.length > 0) {
      try {
        await this.options.rebuildIndex({ ...this.lastSuccess });
      } catch (error) {
        logger.error({ err: error }, 'index_rebuild_failed');
      }
    }

    return records;
  }

  async runDue(): Promise<JobStatusRecord[]> {
    return this.runJobs(this.dueJobs());
  }

  /**
   * Loop until stop() is called.
   */
  async run(): Promise<void> {
    const { logger } = this.options;
    logger.info(
      { jobs: this.options.jobs.map((job) => ({ kind: job.kind, enabled: job.enabled, intervalSeconds: job.intervalSeconds })) },
      'scheduler_start'
    );

    while (!this.stopped) {
      await this.runDue();
      if (this.stopped) break;

      const waitMs = this.msUntilNextRun();
      if (waitMs > 0) {
        logger.debug({ waitMs }, 'scheduler_sleep');
        await this.sleep(waitMs, this.abort.signal);
      }
    }

    logger.info('scheduler_stopped');
  }

  /** Stop after the running job finishes; interrupts the idle sleep. */
  stop(): void {
    this.stopped = true;
    this.abort.abort();
  }
}
