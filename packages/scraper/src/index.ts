// @cinefeed/scraper
// Catalog fetch orchestration and page renderers

export {
  fetchCatalog,
  mergeListings,
  SessionAccumulator,
  type CacheTtls,
  type FetchCatalogOptions,
  type FetchCatalogDeps,
  type FetchCatalogResult,
  type FetchStats,
} from './catalog.js';
export { withTimeout, attemptFetch, type AbortableTask } from './concurrency.js';
export { BrowserManager, type BrowserOptions } from './scraper/browser.js';
export { CineplexxRenderer, type CineplexxRendererConfig } from './scraper/cineplexx.js';
export {
  TelegramRenderer,
  normalizeChannelName,
  toChannelPage,
  type TelegramRendererConfig,
} from './scraper/telegram.js';
export type { PageRenderer, ChannelRenderer } from './scraper/types.js';
export * from './scraper/parser.js';
