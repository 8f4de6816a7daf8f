import { createHash } from 'crypto';
import type { ChangeEvent, ChannelPage, ChannelPost, Movie, SessionSlot, Snapshot } from '@cinefeed/shared';

const CONTENT_NS = 'http://purl.org/rss/1.0/modules/content/';

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/** Wrap markup in CDATA, splitting any "]]>" it contains. */
export function cdata(value: string): string {
  return `<![CDATA[${value.replaceAll(']]>', ']]]]><![CDATA[>')}]]>`;
}

/** RFC 822 date for pubDate. Unparseable input falls back to `fallback`. */
export function toRfc822(value: string | undefined, fallback: Date): string {
  if (value) {
    const parsed = new Date(value);
    if (!Number.isNaN(parsed.getTime())) return parsed.toUTCString();
  }
  return fallback.toUTCString();
}

export function eventGuid(event: Pick<ChangeEvent, 'kind' | 'url' | 'detectedAt'>): string {
  const digest = createHash('sha256').update(`event:${event.kind}|${event.url}|${event.detectedAt}`).digest('hex');
  return `urn:sha256:${digest}`;
}

export interface RssHeader {
  title: string;
  link: string;
  description: string;
  lastBuildDate: Date;
}

export function renderRss(header: RssHeader, items: string[][]): string {
  const lines = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<rss version="2.0" xmlns:content="${CONTENT_NS}">`,
    '<channel>',
    `<title>${escapeXml(header.title)}</title>`,
    `<link>${escapeXml(header.link)}</link>`,
    `<description>${escapeXml(header.description)}</description>`,
    `<lastBuildDate>${header.lastBuildDate.toUTCString()}</lastBuildDate>`,
  ];
  for (const item of items) {
    lines.push('<item>', ...item, '</item>');
  }
  lines.push('</channel>', '</rss>');
  return `${lines.join('\n')}\n`;
}

const EVENT_PREFIX: Record<ChangeEvent['kind'], string> = {
  added: 'Added: ',
  removed: 'Removed: ',
};

export function eventItem(event: ChangeEvent, feedLink: string, now: Date): string[] {
  const title = `${EVENT_PREFIX[event.kind]}${event.title}`;
  const link = event.url || feedLink;
  const description = `${title}\nlocation=${event.location}, date=${event.date}\n${link}`;
  return [
    `<title>${escapeXml(title)}</title>`,
    `<link>${escapeXml(link)}</link>`,
    `<guid isPermaLink="false">${eventGuid(event)}</guid>`,
    `<pubDate>${toRfc822(event.detectedAt, now)}</pubDate>`,
    `<description>${escapeXml(description)}</description>`,
  ];
}

function sessionLine(session: SessionSlot): string {
  const when = [session.date, session.time].filter(Boolean).join(' ');
  const parts = [when, session.hall, session.venueName, session.info].filter(Boolean).map(escapeXml);
  const text = parts.join(' · ');
  if (!session.purchaseUrl) return `<li>${text}</li>`;
  return `<li>${text} <a href="${escapeXml(session.purchaseUrl)}">Tickets</a></li>`;
}

/** HTML body of a movie item. */
export function movieHtml(movie: Movie): string {
  const blocks: string[] = [];
  if (movie.description) {
    blocks.push(`<p>${escapeXml(movie.description)}</p>`);
  }
  if (movie.sessions.length > 0) {
    blocks.push(`<ul>${movie.sessions.map(sessionLine).join('')}</ul>`);
  }
  return blocks.join('');
}

export function movieItem(movie: Movie, snapshot: Snapshot, now: Date): string[] {
  const url = escapeXml(movie.canonicalUrl);
  const description = movie.description || `Now showing: ${movie.title}`;
  return [
    `<title>${escapeXml(movie.title)}</title>`,
    `<link>${url}</link>`,
    `<guid isPermaLink="true">${url}</guid>`,
    `<pubDate>${toRfc822(snapshot[movie.canonicalUrl]?.firstSeen, now)}</pubDate>`,
    `<description>${escapeXml(description)}</description>`,
    `<content:encoded>${cdata(movieHtml(movie))}</content:encoded>`,
  ];
}

export interface CatalogFeedInput {
  title: string;
  link: string;
  description: string;
  now: Date;
  /** Full event log, oldest first. */
  events: readonly ChangeEvent[];
  eventsLimit: number;
  movies: readonly Movie[];
  snapshot: Snapshot;
}

/**
 * Catalog feed: the most recent change events first, then every movie
 * currently showing.
 */
export function buildCatalogFeed(input: CatalogFeedInput): string {
  const recent = input.eventsLimit > 0 ? input.events.slice(-input.eventsLimit).reverse() : [];

  const items = [
    ...recent.map((event) => eventItem(event, input.link, input.now)),
    ...input.movies.map((movie) => movieItem(movie, input.snapshot, input.now)),
  ];

  return renderRss(
    { title: input.title, link: input.link, description: input.description, lastBuildDate: input.now },
    items
  );
}

const POST_TITLE_LENGTH = 100;

export function postTitle(post: ChannelPost): string {
  const firstLine = post.text.split('\n').find((line) => line.trim().length > 0)?.trim();
  if (!firstLine) return `Post ${post.id}`;
  return firstLine.length > POST_TITLE_LENGTH ? `${firstLine.slice(0, POST_TITLE_LENGTH - 1)}…` : firstLine;
}

export function channelFeedFilename(channel: string): string {
  return `telegram_${channel}.xml`;
}

export function buildChannelFeed(page: ChannelPage, options: { now: Date; postLimit: number }): string {
  const posts = page.posts.slice(0, Math.max(0, options.postLimit));
  const items = posts.map((post) => [
    `<title>${escapeXml(postTitle(post))}</title>`,
    `<link>${escapeXml(post.url)}</link>`,
    `<guid isPermaLink="true">${escapeXml(post.url)}</guid>`,
    `<pubDate>${toRfc822(post.publishedAt, options.now)}</pubDate>`,
    `<description>${escapeXml(post.text)}</description>`,
    `<content:encoded>${cdata(post.html)}</content:encoded>`,
  ]);

  return renderRss(
    {
      title: page.title || page.channel,
      link: `https://t.me/s/${page.channel}`,
      description: page.description || `Telegram channel @${page.channel}`,
      lastBuildDate: options.now,
    },
    items
  );
}
