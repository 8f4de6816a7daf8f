// @cinefeed/shared
// Domain types, cache, state engine and storage helpers

export * from './types/movie.js';
export * from './types/event.js';
export * from './types/status.js';
export * from './types/channel.js';
export * from './result.js';
export * from './errors.js';
export * from './logger.js';
export * from './cache/cache.js';
export * from './cache/redis-cache.js';
export * from './state/state.js';
export * from './fs/atomic-write.js';
export * from './storage/gcs-storage.js';
