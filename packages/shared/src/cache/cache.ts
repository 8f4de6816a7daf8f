import { createHash } from 'node:crypto';

/**
 * TTL key/value store holding JSON values.
 * Implementations never reject: a backend failure is a miss or a no-op.
 */
export interface Cache {
  /** Resolves to undefined on a miss. */
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown, ttlSeconds: number): Promise<void>;
  close(): Promise<void>;
}

/**
 * Cache used when caching is disabled.
 */
export class NullCache implements Cache {
  async get(_key: string): Promise<unknown> {
    return undefined;
  }

  async set(_key: string, _value: unknown, _ttlSeconds: number): Promise<void> {}

  async close(): Promise<void> {}
}

const KEY_PREFIX = 'cinefeed';

function digest(raw: string): string {
  return createHash('sha1').update(raw, 'utf8').digest('hex');
}

export function descriptionCacheKey(canonicalUrl: string): string {
  return `${KEY_PREFIX}:description:${digest(`description|${canonicalUrl}`)}`;
}

export function scheduleCacheKey(canonicalUrl: string, location: string, date: string): string {
  return `${KEY_PREFIX}:schedule:${digest(`schedule|${canonicalUrl}|${location}|${date}`)}`;
}
