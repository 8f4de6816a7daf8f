import { pino, type Logger } from 'pino';

export type { Logger } from 'pino';

export interface LoggerOptions {
  level?: string;
  pretty?: boolean;
}

/**
 * Create the process logger.
 * pino-pretty is only used when asked for, or when stdout is a terminal.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? process.env.LOG_LEVEL ?? 'info';
  const pretty = options.pretty ?? (Boolean(process.env.LOG_PRETTY) || process.stdout.isTTY === true);

  if (!pretty) {
    return pino({ level });
  }

  return pino({
    level,
    transport: {
      target: 'pino-pretty',
      options: { colorize: true },
    },
  });
}

/**
 * Per-run context threaded through a job.
 */
export interface JobContext {
  runId: string;
  job: string;
  logger: Logger;
}

export function createJobContext(logger: Logger, runId: string, job: string): JobContext {
  return {
    runId,
    job,
    logger: logger.child({ runId, job }),
  };
}
