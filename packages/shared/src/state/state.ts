import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { Logger } from 'pino';
import { StateCorruptionError } from '../errors.js';
import { atomicWriteFile } from '../fs/atomic-write.js';
import type { CatalogEntry } from '../types/movie.js';
import type { CatalogState, ChangeEvent, Snapshot } from '../types/event.js';

const SnapshotRecordSchema = z.object({
  title: z.string(),
  firstSeen: z.string(),
  lastSeen: z.string(),
});

// Older state files stored only `url -> title`.
const PersistedSnapshotSchema = z.record(z.union([SnapshotRecordSchema, z.string()]));

const ChangeEventSchema = z.object({
  kind: z.enum(['added', 'removed']),
  title: z.string(),
  url: z.string(),
  detectedAt: z.string(),
  location: z.string(),
  date: z.string(),
});

const PersistedStateSchema = z.object({
  snapshot: PersistedSnapshotSchema.nullish(),
  events: z.array(z.unknown()).nullish(),
});

export function emptyState(): CatalogState {
  return { snapshot: {}, events: [] };
}

/**
 * Load persisted state. A missing or unreadable file yields an empty state.
 */
export async function loadSnapshotState(
  path: string,
  logger?: Logger,
  now: Date = new Date()
): Promise<CatalogState> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      logger?.info({ path }, 'state_missing');
    } else {
      logger?.warn({ path, err: error }, 'state_read_failed');
    }
    return emptyState();
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    logger?.warn({ err: new StateCorruptionError(path, 'state file is not valid JSON', { cause: error }) }, 'state_corrupt');
    return emptyState();
  }

  const parsed = PersistedStateSchema.safeParse(json);
  if (!parsed.success) {
    logger?.warn(
      { err: new StateCorruptionError(path, parsed.error.message) },
      'state_corrupt'
    );
    return emptyState();
  }

  const nowIso = now.toISOString();
  const snapshot: Snapshot = {};
  for (const [url, value] of Object.entries(parsed.data.snapshot ?? {})) {
    snapshot[url] = typeof value === 'string'
      ? { title: value, firstSeen: nowIso, lastSeen: nowIso }
      : value;
  }

  const events: ChangeEvent[] = [];
  let dropped = 0;
  for (const candidate of parsed.data.events ?? []) {
    const event = ChangeEventSchema.safeParse(candidate);
    if (event.success) {
      events.push(event.data);
    } else {
      dropped++;
    }
  }
  if (dropped > 0) {
    logger?.warn({ path, dropped }, 'state_events_dropped');
  }

  return { snapshot, events };
}

/**
 * Persist state atomically.
 */
export async function saveState(path: string, state: CatalogState): Promise<void> {
  await atomicWriteFile(path, JSON.stringify({ snapshot: state.snapshot, events: state.events }, null, 2));
}

export interface Diff {
  added: CatalogEntry[];
  removed: CatalogEntry[];
}

function byUrl(a: CatalogEntry, b: CatalogEntry): number {
  if (a.canonicalUrl < b.canonicalUrl) return -1;
  if (a.canonicalUrl > b.canonicalUrl) return 1;
  return 0;
}

/**
 * Set difference on canonical URLs. Titles do not affect membership.
 */
export function computeDiff(prevSnapshot: Snapshot, current: readonly CatalogEntry[]): Diff {
  const currentByUrl = new Map<string, string>();
  for (const entry of current) {
    currentByUrl.set(entry.canonicalUrl, entry.title);
  }

  const added: CatalogEntry[] = [];
  for (const [canonicalUrl, title] of currentByUrl) {
    if (!Object.hasOwn(prevSnapshot, canonicalUrl)) {
      added.push({ title, canonicalUrl });
    }
  }

  const removed: CatalogEntry[] = [];
  for (const [canonicalUrl, record] of Object.entries(prevSnapshot)) {
    if (!currentByUrl.has(canonicalUrl)) {
      removed.push({ title: record.title, canonicalUrl });
    }
  }

  return { added: added.sort(byUrl), removed: removed.sort(byUrl) };
}

export interface AppendEventsOptions {
  added: readonly CatalogEntry[];
  removed: readonly CatalogEntry[];
  detectedAt: string;
  location: string;
  date: string;
  maxEvents: number;
}

/**
 * Append added events, then removed events, and trim the oldest entries so
 * the log holds at most `maxEvents`.
 */
export function appendEvents(state: CatalogState, options: AppendEventsOptions): void {
  const { added, removed, detectedAt, location, date, maxEvents } = options;

  for (const entry of added) {
    state.events.push({ kind: 'added', title: entry.title, url: entry.canonicalUrl, detectedAt, location, date });
  }
  for (const entry of removed) {
    state.events.push({ kind: 'removed', title: entry.title, url: entry.canonicalUrl, detectedAt, location, date });
  }

  if (state.events.length > maxEvents) {
    state.events.splice(0, state.events.length - maxEvents);
  }
}

/**
 * Replace the snapshot with the currently present URLs, carrying forward
 * `firstSeen` for URLs that were already present.
 */
export function updateSnapshot(state: CatalogState, current: readonly CatalogEntry[], now: string): void {
  const next: Snapshot = {};
  for (const entry of current) {
    const previous = state.snapshot[entry.canonicalUrl];
    next[entry.canonicalUrl] = {
      title: entry.title,
      firstSeen: previous?.firstSeen ?? now,
      lastSeen: now,
    };
  }
  state.snapshot = next;
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
