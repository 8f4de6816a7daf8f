import type { CatalogEntry, ChannelPage, SessionSlot } from '@cinefeed/shared';

/**
 * Renders pages of the catalog site in a browser engine.
 * Every method may reject with a timeout or navigation error. An aborted
 * signal makes a pending render reject promptly.
 */
export interface PageRenderer {
  renderListing(date: string, signal?: AbortSignal): Promise<CatalogEntry[]>;
  /** Resolves to an empty string when the page has no description. */
  renderDescription(canonicalUrl: string, signal?: AbortSignal): Promise<string>;
  renderSchedule(canonicalUrl: string, date: string, location: string, signal?: AbortSignal): Promise<SessionSlot[]>;
  close(): Promise<void>;
}

/**
 * Renders the public preview page of a channel.
 */
export interface ChannelRenderer {
  renderChannel(channel: string, signal?: AbortSignal): Promise<ChannelPage>;
  close(): Promise<void>;
}
