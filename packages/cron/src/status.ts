import type { JobKind, JobStatusRecord, StatusFile } from '@cinefeed/shared';
import type { OutputWriter } from './output.js';

export const STATUS_FILENAME = 'status.json';

/**
 * Holds status.json in memory and rewrites it after every job.
 */
export class StatusStore {
  private status: StatusFile;

  constructor(
    private readonly output: OutputWriter,
    runId: string,
    private readonly now: () => Date = () => new Date()
  ) {
    this.status = { runId, updatedAt: now().toISOString(), cineplexxJob: null, telegramJob: null };
  }

  get current(): StatusFile {
    return this.status;
  }

  async record(kind: JobKind, record: JobStatusRecord): Promise<void> {
    const updatedAt = this.now().toISOString();
    this.status =
      kind === 'catalog'
        ? { ...this.status, updatedAt, cineplexxJob: record }
        : { ...this.status, updatedAt, telegramJob: record };
    await this.output.write(STATUS_FILENAME, `${JSON.stringify(this.status, null, 2)}\n`);
  }
}
