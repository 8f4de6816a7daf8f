import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { pino } from 'pino';
import type { GcsStorageService, JobStatusRecord, Logger } from '@cinefeed/shared';
import { OutputWriter, contentTypeFor } from '../output.js';
import { StatusStore } from '../status.js';

const logger = pino({ level: 'silent' });

describe('contentTypeFor', () => {
  it('should map published file types', () => {
    expect(contentTypeFor('cineplexx_rss.xml')).toBe('application/rss+xml; charset=utf-8');
    expect(contentTypeFor('status.json')).toBe('application/json; charset=utf-8');
    expect(contentTypeFor('index.HTML')).toBe('text/html; charset=utf-8');
    expect(contentTypeFor('notes.txt')).toBe('application/octet-stream');
  });
});

describe('OutputWriter', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'cinefeed-output-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write files under the output directory', async () => {
    const output = new OutputWriter(join(dir, 'nested'), logger);

    await output.write('feed.xml', '<rss/>');

    expect(await readFile(join(dir, 'nested', 'feed.xml'), 'utf-8')).toBe('<rss/>');
    expect(await readdir(join(dir, 'nested'))).toEqual(['feed.xml']);
  });

  it('should mirror files to the configured bucket', async () => {
    const upload = vi.fn(async () => {});
    const storage: GcsStorageService = { upload };
    const output = new OutputWriter(dir, logger, { storage, bucket: 'test-bucket' });

    await output.write('feed.xml', '<rss/>');

    expect(upload).toHaveBeenCalledWith(
      'test-bucket',
      'feed.xml',
      Buffer.from('<rss/>', 'utf-8'),
      'application/rss+xml; charset=utf-8'
    );
  });

  it('should keep the local file when mirroring fails', async () => {
    const warn = vi.fn();
    const debug = vi.fn();
    const storage: GcsStorageService = { upload: vi.fn(async () => Promise.reject(new Error('forbidden'))) };
    const output = new OutputWriter(dir, { warn, debug } as unknown as Logger, { storage, bucket: 'test-bucket' });

    await expect(output.write('status.json', '{}')).resolves.toBeUndefined();

    expect(await readFile(join(dir, 'status.json'), 'utf-8')).toBe('{}');
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[1]).toBe('output_mirror_failed');
  });
});

describe('StatusStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'cinefeed-status-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const record: JobStatusRecord = {
    enabled: true,
    status: 'ok',
    startedAt: '2026-01-04T00:00:00.000Z',
    finishedAt: '2026-01-04T00:00:10.000Z',
    durationSeconds: 10,
    counts: { movies: 3 },
    lastSuccessAt: '2026-01-04T00:00:10.000Z',
  };

  it('should start with both jobs unrun', () => {
    const store = new StatusStore(new OutputWriter(dir, logger), 'run-1', () => new Date('2026-01-04T00:00:00.000Z'));

    expect(store.current).toEqual({
      runId: 'run-1',
      updatedAt: '2026-01-04T00:00:00.000Z',
      cineplexxJob: null,
      telegramJob: null,
    });
  });

  it('should persist each job under its own key', async () => {
    const store = new StatusStore(new OutputWriter(dir, logger), 'run-1', () => new Date('2026-01-04T00:00:11.000Z'));

    await store.record('catalog', record);
    const afterCatalog = JSON.parse(await readFile(join(dir, 'status.json'), 'utf-8'));
    await store.record('channels', { ...record, status: 'partial' });
    const afterChannels = JSON.parse(await readFile(join(dir, 'status.json'), 'utf-8'));

    expect(afterCatalog).toEqual({
      runId: 'run-1',
      updatedAt: '2026-01-04T00:00:11.000Z',
      cineplexxJob: record,
      telegramJob: null,
    });
    expect(afterChannels.cineplexxJob).toEqual(record);
    expect(afterChannels.telegramJob.status).toBe('partial');
  });
});
