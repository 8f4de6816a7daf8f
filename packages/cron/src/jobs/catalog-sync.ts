/**
 * Catalog sync: fetch the current catalog, diff it against the stored
 * snapshot, append change events and publish the catalog feed.
 */

import {
  appendEvents,
  computeDiff,
  loadSnapshotState,
  saveState,
  updateSnapshot,
  type Cache,
  type JobContext,
} from '@cinefeed/shared';
import { fetchCatalog, type FetchCatalogResult, type PageRenderer } from '@cinefeed/scraper';
import { resolveRunDate, type AppConfig } from '../config.js';
import { buildCatalogFeed } from '../feed/rss.js';
import type { OutputWriter } from '../output.js';
import { closeRenderer, type JobOutput } from './job.js';

export interface CatalogSyncDeps {
  config: AppConfig;
  createRenderer: () => PageRenderer;
  cache: Cache;
  output: OutputWriter;
  now?: () => Date;
}

export function stateFilename(location: string): string {
  return `state_location_${location}.json`;
}

export async function runCatalogSync(ctx: JobContext, deps: CatalogSyncDeps): Promise<JobOutput> {
  const { config, output } = deps;
  const now = deps.now ?? (() => new Date());
  const { catalog, fetch: fetchConfig, cache: cacheConfig } = config;

  const startedAt = now();
  const runDate = resolveRunDate(catalog, startedAt);
  const statePath = output.path(stateFilename(catalog.location));

  // 1. load
  const state = await loadSnapshotState(statePath, ctx.logger, startedAt);

  // 2. fetch
  const renderer = deps.createRenderer();
  let result: FetchCatalogResult;
  try {
    result = await fetchCatalog(
      {
        runDate,
        location: catalog.location,
        lookaheadDays: fetchConfig.lookaheadDays,
        descriptionConcurrency: fetchConfig.descriptionConcurrency,
        scheduleConcurrency: fetchConfig.scheduleConcurrency,
        scheduleEnabled: fetchConfig.scheduleEnabled,
        maxSessionsPerMovie: fetchConfig.maxSessionsPerMovie,
        maxDatesPerMovie: fetchConfig.maxDatesPerMovie,
        renderTimeoutMs: fetchConfig.renderTimeoutMs,
        ttl: {
          descriptionPositive: cacheConfig.descriptionTtlSeconds,
          descriptionNegative: cacheConfig.descriptionNegativeTtlSeconds,
          schedulePositive: cacheConfig.scheduleTtlSeconds,
          scheduleNegative: cacheConfig.scheduleNegativeTtlSeconds,
        },
      },
      { renderer, cache: deps.cache, logger: ctx.logger, now }
    );
  } finally {
    await closeRenderer(renderer, ctx);
  }
  const { movies, stats } = result;

  // 3. diff and append
  const detectedAt = now().toISOString();
  const { added, removed } = computeDiff(state.snapshot, movies);
  appendEvents(state, {
    added,
    removed,
    detectedAt,
    location: catalog.location,
    date: runDate,
    maxEvents: catalog.maxEventsInState,
  });
  updateSnapshot(state, movies, detectedAt);

  // 4. persist
  await saveState(statePath, state);
  ctx.logger.info({ added: added.length, removed: removed.length, events: state.events.length }, 'state_saved');

  // 5. publish
  const feed = buildCatalogFeed({
    title: catalog.feedTitle,
    link: catalog.feedLink,
    description: catalog.feedDescription,
    now: now(),
    events: state.events,
    eventsLimit: catalog.eventsLimit,
    movies,
    snapshot: state.snapshot,
  });
  await output.write(catalog.rssFilename, feed);
  ctx.logger.info({ file: catalog.rssFilename, movies: movies.length }, 'catalog_feed_written');

  return {
    status: 'ok',
    counts: {
      movies: movies.length,
      added: added.length,
      removed: removed.length,
      events: state.events.length,
      ...stats,
    },
  };
}
