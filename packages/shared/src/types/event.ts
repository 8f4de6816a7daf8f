export type EventKind = 'added' | 'removed';

/**
 * A detected addition or removal. Never modified once appended to the log.
 */
export interface ChangeEvent {
  kind: EventKind;
  title: string;
  url: string;
  detectedAt: string; // ISO 8601
  location: string;
  date: string; // YYYY-MM-DD the listing was requested for
}

/**
 * What the engine remembers about a URL that was present in the last cycle.
 */
export interface SnapshotRecord {
  title: string;
  firstSeen: string; // ISO 8601
  lastSeen: string; // ISO 8601
}

export type Snapshot = Record<string, SnapshotRecord>;

/**
 * Persisted catalog state for one location.
 */
export interface CatalogState {
  snapshot: Snapshot;
  events: ChangeEvent[];
}
