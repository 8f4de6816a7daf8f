import { randomUUID } from 'crypto';
import {
  buildCache,
  createGcsStorage,
  type Cache,
  type GcsStorageService,
  type Logger,
} from '@cinefeed/shared';
import {
  BrowserManager,
  CineplexxRenderer,
  TelegramRenderer,
  type ChannelRenderer,
  type PageRenderer,
} from '@cinefeed/scraper';
import type { AppConfig } from './config.js';
import { listFeeds, writeIndex } from './feed/index-page.js';
import { runCatalogSync } from './jobs/catalog-sync.js';
import { runChannelSync } from './jobs/channel-sync.js';
import { OutputWriter } from './output.js';
import { Scheduler, type ScheduledJob, type SleepFn } from './scheduler.js';
import { StatusStore } from './status.js';

/**
 * Collaborators that tests replace with in-process fakes.
 */
export interface AppOverrides {
  runId?: string;
  cache?: Cache;
  storage?: GcsStorageService;
  createPageRenderer?: () => PageRenderer;
  createChannelRenderer?: () => ChannelRenderer;
  now?: () => Date;
  sleep?: SleepFn;
}

export interface App {
  runId: string;
  jobs: ScheduledJob[];
  scheduler: Scheduler;
  status: StatusStore;
  output: OutputWriter;
  close(): Promise<void>;
}

export async function createApp(config: AppConfig, logger: Logger, overrides: AppOverrides = {}): Promise<App> {
  const runId = overrides.runId ?? randomUUID();
  const now = overrides.now ?? (() => new Date());

  const cache = overrides.cache ?? (await buildCache(config.cache, logger));

  const bucket = config.output.gcsBucket;
  const output = new OutputWriter(
    config.output.outDir,
    logger,
    bucket ? { storage: overrides.storage ?? createGcsStorage(), bucket } : undefined
  );
  const status = new StatusStore(output, runId, now);

  // Each job run launches its own browser and closes it when done
  const browserOptions = { executablePath: config.fetch.chromiumPath };
  const createPageRenderer =
    overrides.createPageRenderer ??
    (() =>
      new CineplexxRenderer(
        {
          baseUrl: config.catalog.baseUrl,
          location: config.catalog.location,
          navigationTimeoutMs: config.fetch.navigationTimeoutMs,
        },
        new BrowserManager(browserOptions)
      ));
  const createChannelRenderer =
    overrides.createChannelRenderer ??
    (() =>
      new TelegramRenderer({ navigationTimeoutMs: config.fetch.navigationTimeoutMs }, new BrowserManager(browserOptions)));

  const jobs: ScheduledJob[] = [
    {
      kind: 'catalog',
      enabled: config.catalog.enabled,
      intervalSeconds: config.catalog.intervalSeconds,
      run: (ctx) => runCatalogSync(ctx, { config, createRenderer: createPageRenderer, cache, output, now }),
    },
    {
      kind: 'channels',
      enabled: config.channels.enabled,
      intervalSeconds: config.channels.intervalSeconds,
      run: (ctx) => runChannelSync(ctx, { config, createRenderer: createChannelRenderer, output, now }),
    },
  ];

  const scheduler = new Scheduler({
    runId,
    jobs,
    logger,
    status,
    idleSeconds: config.scheduler.idleSeconds,
    now,
    ...(overrides.sleep ? { sleep: overrides.sleep } : {}),
    rebuildIndex: (lastSuccess) =>
      writeIndex(output, {
        siteTitle: config.output.siteTitle,
        feeds: listFeeds(config, lastSuccess),
        generatedAt: now(),
      }),
  });

  return {
    runId,
    jobs,
    scheduler,
    status,
    output,
    async close() {
      try {
        await cache.close();
      } catch (error) {
        logger.warn({ err: error }, 'cache_close_failed');
      }
    },
  };
}

export interface JobSelection {
  catalog?: boolean;
  channels?: boolean;
}

/**
 * Jobs for a one-off run. Without an explicit selection every enabled job
 * runs; an explicitly selected job runs even when disabled in the config.
 */
export function selectJobs(jobs: readonly ScheduledJob[], selection: JobSelection): ScheduledJob[] {
  const explicit = Boolean(selection.catalog) || Boolean(selection.channels);
  if (!explicit) return jobs.filter((job) => job.enabled);
  return jobs.filter((job) => (job.kind === 'catalog' ? selection.catalog : selection.channels));
}
