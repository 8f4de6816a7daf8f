import { JobError, errorMessage, type JobContext, type JobKind, type JobStatusRecord } from '@cinefeed/shared';

/**
 * What a job reports when its control flow completes.
 * `partial` means some isolated units failed and were skipped.
 */
export interface JobOutput {
  status: 'ok' | 'partial';
  counts: Record<string, number>;
  error?: string;
}

export type JobRunner = (ctx: JobContext) => Promise<JobOutput>;

export interface ExecuteJobOptions {
  enabled: boolean;
  now: () => Date;
  previousSuccessAt: string | null;
}

function durationSeconds(started: Date, finished: Date): number {
  return Math.round((finished.getTime() - started.getTime()) / 10) / 100;
}

/**
 * Run a job and turn its outcome into a status record. Never rejects:
 * an uncaught failure becomes status "error".
 */
export async function executeJob(
  kind: JobKind,
  ctx: JobContext,
  runner: JobRunner,
  options: ExecuteJobOptions
): Promise<JobStatusRecord> {
  const started = options.now();
  ctx.logger.info('job_start');

  let output: JobOutput;
  try {
    output = await runner(ctx);
  } catch (error) {
    const failure = error instanceof JobError ? error : new JobError(kind, errorMessage(error), { cause: error });
    const finished = options.now();
    ctx.logger.error({ err: failure, duration: durationSeconds(started, finished) }, 'job_failed');
    return {
      enabled: options.enabled,
      status: 'error',
      startedAt: started.toISOString(),
      finishedAt: finished.toISOString(),
      durationSeconds: durationSeconds(started, finished),
      counts: {},
      error: failure.message,
      lastSuccessAt: options.previousSuccessAt,
    };
  }

  const finished = options.now();
  const duration = durationSeconds(started, finished);
  ctx.logger.info({ status: output.status, counts: output.counts, duration }, 'job_done');

  return {
    enabled: options.enabled,
    status: output.status,
    startedAt: started.toISOString(),
    finishedAt: finished.toISOString(),
    durationSeconds: duration,
    counts: output.counts,
    ...(output.error !== undefined ? { error: output.error } : {}),
    lastSuccessAt: finished.toISOString(),
  };
}

/** Release a renderer without letting a close failure replace the job's outcome. */
export async function closeRenderer(renderer: { close(): Promise<void> }, ctx: JobContext): Promise<void> {
  try {
    await renderer.close();
  } catch (error) {
    ctx.logger.warn({ err: error }, 'renderer_close_failed');
  }
}
