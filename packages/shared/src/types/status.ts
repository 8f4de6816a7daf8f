export type JobKind = 'catalog' | 'channels';

export type JobOutcome = 'ok' | 'partial' | 'error';

/**
 * Result of a single job run. Overwritten on every cycle.
 */
export interface JobStatusRecord {
  enabled: boolean;
  status: JobOutcome;
  startedAt: string;
  finishedAt: string;
  durationSeconds: number;
  counts: Record<string, number>;
  error?: string;
  lastSuccessAt: string | null;
}

/**
 * Contents of status.json
 */
export interface StatusFile {
  runId: string;
  updatedAt: string;
  cineplexxJob: JobStatusRecord | null;
  telegramJob: JobStatusRecord | null;
}
