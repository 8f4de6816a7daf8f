import pLimit from 'p-limit';
import { z } from 'zod';
import type { Logger } from 'pino';
import {
  descriptionCacheKey,
  scheduleCacheKey,
  type Cache,
  type CatalogEntry,
  type Movie,
  type SessionSlot,
} from '@cinefeed/shared';
import { attemptFetch } from './concurrency.js';
import { buildDateWindow, canonicalizeUrl, compareByTitleThenUrl, normalizeSpace } from './scraper/parser.js';
import type { PageRenderer } from './scraper/types.js';

/**
 * Cache lifetimes in seconds. Negative entries record "nothing there".
 */
export interface CacheTtls {
  descriptionPositive: number;
  descriptionNegative: number;
  schedulePositive: number;
  scheduleNegative: number;
}

export interface FetchCatalogOptions {
  runDate: string; // YYYY-MM-DD
  location: string;
  lookaheadDays: number;
  descriptionConcurrency: number;
  scheduleConcurrency: number;
  scheduleEnabled: boolean;
  maxSessionsPerMovie: number;
  maxDatesPerMovie: number;
  renderTimeoutMs: number;
  ttl: CacheTtls;
}

export interface FetchCatalogDeps {
  renderer: PageRenderer;
  cache: Cache;
  logger: Logger;
  now?: () => Date;
}

export interface FetchStats {
  listingDates: number;
  listingFailures: number;
  entriesFound: number;
  descriptionCacheHits: number;
  descriptionCacheMisses: number;
  descriptionPagesFetched: number;
  descriptionFailures: number;
  scheduleCacheHits: number;
  scheduleCacheMisses: number;
  datesProbed: number;
  datesWithSessions: number;
  sessionsFound: number;
  scheduleFailures: number;
}

export interface FetchCatalogResult {
  movies: Movie[];
  stats: FetchStats;
}

const DescriptionCacheSchema = z.object({
  title: z.string().optional(),
  description: z.string().nullable(),
  error: z.literal('not_found').optional(),
  fetchedAt: z.string(),
});

const SessionSlotSchema = z.object({
  date: z.string().default(''),
  time: z.string().default(''),
  hall: z.string().default(''),
  info: z.string().default(''),
  sessionId: z.string().default(''),
  venueName: z.string().default(''),
  purchaseUrl: z.string().default(''),
});

const ScheduleCacheSchema = z.object({
  sessions: z.array(SessionSlotSchema),
  error: z.literal('no_sessions').optional(),
  fetchedAt: z.string(),
});

/**
 * Collects sessions for one movie in window-date order until either cap is hit.
 */
export class SessionAccumulator {
  readonly sessions: SessionSlot[] = [];
  private readonly dates = new Set<string>();
  private closed = false;

  constructor(
    private readonly maxSessions: number,
    private readonly maxDates: number
  ) {}

  get isClosed(): boolean {
    return this.closed;
  }

  /** Must be called once per window date, in window order. */
  add(date: string, slots: readonly SessionSlot[]): void {
    if (this.closed || slots.length === 0) return;

    for (const slot of slots) {
      if (this.sessions.length >= this.maxSessions) break;
      this.sessions.push({ ...slot, date });
    }
    this.dates.add(date);

    if (this.sessions.length >= this.maxSessions || this.dates.size >= this.maxDates) {
      this.closed = true;
    }
  }
}

function emptyStats(): FetchStats {
  return {
    listingDates: 0,
    listingFailures: 0,
    entriesFound: 0,
    descriptionCacheHits: 0,
    descriptionCacheMisses: 0,
    descriptionPagesFetched: 0,
    descriptionFailures: 0,
    scheduleCacheHits: 0,
    scheduleCacheMisses: 0,
    datesProbed: 0,
    datesWithSessions: 0,
    sessionsFound: 0,
    scheduleFailures: 0,
  };
}

/**
 * Merges listings of several dates by canonical URL. The first non-empty
 * title seen for a URL wins; entries keep first-seen order.
 */
export function mergeListings(listings: readonly (readonly CatalogEntry[])[]): CatalogEntry[] {
  const titles = new Map<string, string>();
  for (const listing of listings) {
    for (const entry of listing) {
      const url = canonicalizeUrl(entry.canonicalUrl);
      if (!url) continue;
      const title = normalizeSpace(entry.title);
      const existing = titles.get(url);
      if (existing === undefined || (existing === '' && title !== '')) {
        titles.set(url, title);
      }
    }
  }
  return Array.from(titles, ([canonicalUrl, title]) => ({ title, canonicalUrl }));
}

/**
 * Produce the current catalog: listing for every window date, then
 * description and schedules per title through two independent bounded pools.
 * A failed render never removes a title; it only leaves its data empty.
 */
export async function fetchCatalog(
  options: FetchCatalogOptions,
  deps: FetchCatalogDeps
): Promise<FetchCatalogResult> {
  const { renderer, cache, logger } = deps;
  const now = deps.now ?? (() => new Date());
  const { location, ttl, renderTimeoutMs } = options;
  const stats = emptyStats();
  const startedAt = Date.now();

  const dates = buildDateWindow(options.runDate, options.lookaheadDays);
  const describeLimit = pLimit(Math.max(1, options.descriptionConcurrency));
  const scheduleLimit = pLimit(Math.max(1, options.scheduleConcurrency));

  logger.info({ location, runDate: options.runDate, dates: dates.length }, 'catalog_fetch_start');

  async function cacheGet(key: string): Promise<unknown> {
    try {
      return await cache.get(key);
    } catch (error) {
      logger.warn({ key, err: error }, 'cache_get_failed');
      return undefined;
    }
  }

  async function cacheSet(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    try {
      await cache.set(key, value, ttlSeconds);
    } catch (error) {
      logger.warn({ key, err: error }, 'cache_set_failed');
    }
  }

  // 1. Listings, one date at a time so "first title wins" is deterministic
  const listings: CatalogEntry[][] = [];
  for (const date of dates) {
    stats.listingDates++;
    const result = await attemptFetch(`listing ${date}`, renderTimeoutMs, (signal) =>
      renderer.renderListing(date, signal)
    );
    if (result.ok) {
      listings.push(result.value);
    } else {
      stats.listingFailures++;
      logger.warn({ date, err: result.error }, 'movie_list_failed');
    }
  }
  const entries = mergeListings(listings);
  stats.entriesFound = entries.length;
  logger.info({ dates: dates.length, moviesFound: entries.length }, 'movie_list_merged');

  // 2. Description, bounded by P
  function describe(entry: CatalogEntry): Promise<string> {
    return describeLimit(async () => {
      const key = descriptionCacheKey(entry.canonicalUrl);
      const cached = DescriptionCacheSchema.safeParse(await cacheGet(key));
      if (cached.success && (cached.data.description || cached.data.error)) {
        stats.descriptionCacheHits++;
        return cached.data.description ?? '';
      }

      stats.descriptionCacheMisses++;
      stats.descriptionPagesFetched++;
      const result = await attemptFetch(`description ${entry.canonicalUrl}`, renderTimeoutMs, (signal) =>
        renderer.renderDescription(entry.canonicalUrl, signal)
      );
      if (!result.ok) {
        stats.descriptionFailures++;
        logger.warn({ url: entry.canonicalUrl, err: result.error }, 'movie_description_failed');
      }

      const description = result.ok ? normalizeSpace(result.value) : '';
      const fetchedAt = now().toISOString();
      if (description) {
        await cacheSet(key, { title: entry.title, description, fetchedAt }, ttl.descriptionPositive);
      } else {
        logger.warn({ url: entry.canonicalUrl }, 'movie_description_missing');
        await cacheSet(
          key,
          { title: entry.title, description: null, error: 'not_found', fetchedAt },
          ttl.descriptionNegative
        );
      }
      return description;
    });
  }

  // 3. Schedules, bounded by Q
  async function fetchScheduleForDate(canonicalUrl: string, date: string): Promise<SessionSlot[]> {
    const key = scheduleCacheKey(canonicalUrl, location, date);
    const cached = ScheduleCacheSchema.safeParse(await cacheGet(key));
    if (cached.success) {
      stats.scheduleCacheHits++;
      if (cached.data.sessions.length > 0) {
        stats.datesWithSessions++;
        stats.sessionsFound += cached.data.sessions.length;
      }
      return cached.data.sessions;
    }

    stats.scheduleCacheMisses++;
    stats.datesProbed++;
    const result = await attemptFetch(`schedule ${canonicalUrl} ${date}`, renderTimeoutMs, (signal) =>
      renderer.renderSchedule(canonicalUrl, date, location, signal)
    );
    if (!result.ok) {
      stats.scheduleFailures++;
      logger.warn({ url: canonicalUrl, date, err: result.error }, 'schedule_fetch_failed');
    }

    const sessions = result.ok ? result.value : [];
    const fetchedAt = now().toISOString();
    if (sessions.length > 0) {
      stats.datesWithSessions++;
      stats.sessionsFound += sessions.length;
      await cacheSet(key, { sessions, fetchedAt }, ttl.schedulePositive);
    } else {
      await cacheSet(key, { sessions: [], error: 'no_sessions', fetchedAt }, ttl.scheduleNegative);
    }
    return sessions;
  }

  async function collectSessions(entry: CatalogEntry): Promise<SessionSlot[]> {
    const accumulator = new SessionAccumulator(options.maxSessionsPerMovie, options.maxDatesPerMovie);
    const tasks = dates.map((date) =>
      scheduleLimit(async (): Promise<SessionSlot[]> => {
        // Caps already reached by earlier dates: nothing left to collect
        if (accumulator.isClosed) return [];
        return fetchScheduleForDate(entry.canonicalUrl, date);
      })
    );

    for (const [index, task] of tasks.entries()) {
      const slots = await task;
      const date = dates[index];
      if (date !== undefined) {
        accumulator.add(date, slots);
      }
    }
    return accumulator.sessions;
  }

  async function buildMovie(entry: CatalogEntry): Promise<Movie> {
    const [description, sessions] = await Promise.all([
      describe(entry),
      options.scheduleEnabled ? collectSessions(entry) : Promise.resolve<SessionSlot[]>([]),
    ]);
    return { title: entry.title, canonicalUrl: entry.canonicalUrl, description, sessions };
  }

  const built = await Promise.all(entries.map(buildMovie));

  // Drop incomplete entries; sort for deterministic diffing and output
  const movies = built
    .filter((movie) => movie.title !== '' && movie.canonicalUrl !== '')
    .sort(compareByTitleThenUrl);

  logger.info(
    { durationMs: Date.now() - startedAt, moviesFound: movies.length, scheduleEnabled: options.scheduleEnabled, ...stats },
    'catalog_fetch_done'
  );

  return { movies, stats };
}
