import { html } from 'hono/html';
import type { HtmlEscapedString } from 'hono/utils/html';
import type { JobKind } from '@cinefeed/shared';
import { normalizeChannelName } from '@cinefeed/scraper';
import type { AppConfig } from '../config.js';
import type { OutputWriter } from '../output.js';
import { channelFeedFilename, escapeXml, renderRss, toRfc822 } from './rss.js';

type HtmlContent = HtmlEscapedString | Promise<HtmlEscapedString>;

export type FeedKind = 'catalog' | 'channel';

export interface FeedEntry {
  kind: FeedKind;
  title: string;
  href: string;
  lastSuccessAt: string | null;
}

export interface IndexInput {
  siteTitle: string;
  feeds: readonly FeedEntry[];
  generatedAt: Date;
}

export const INDEX_HTML = 'index.html';
export const INDEX_XML = 'index.xml';

/**
 * Feeds the current configuration publishes. Channel names that do not
 * normalize are left out, as the channel job never writes them.
 */
export function listFeeds(config: AppConfig, lastSuccess: Record<JobKind, string | null>): FeedEntry[] {
  const feeds: FeedEntry[] = [];

  if (config.catalog.enabled) {
    feeds.push({
      kind: 'catalog',
      title: config.catalog.feedTitle,
      href: config.catalog.rssFilename,
      lastSuccessAt: lastSuccess.catalog,
    });
  }

  if (config.channels.enabled) {
    for (const raw of config.channels.names) {
      let name: string;
      try {
        name = normalizeChannelName(raw);
      } catch {
        continue;
      }
      feeds.push({
        kind: 'channel',
        title: `@${name}`,
        href: channelFeedFilename(name),
        lastSuccessAt: lastSuccess.channels,
      });
    }
  }

  return feeds;
}

function feedList(feeds: readonly FeedEntry[]): HtmlContent {
  if (feeds.length === 0) {
    return html`<p class="empty">No feeds.</p>`;
  }
  return html`<ul>
      ${feeds.map(
        (feed) => html`<li>
        <a href="${feed.href}">${feed.title}</a>
        <span class="updated">${feed.lastSuccessAt ?? 'never'}</span>
      </li>`
      )}
    </ul>`;
}

export async function buildIndexHtml(input: IndexInput): Promise<string> {
  const catalog = input.feeds.filter((feed) => feed.kind === 'catalog');
  const channels = input.feeds.filter((feed) => feed.kind === 'channel');

  const page = await html`<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${input.siteTitle}</title>
  <link rel="alternate" type="application/rss+xml" href="${INDEX_XML}">
  <style>
    body {
      font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
      line-height: 1.6;
      color: #333;
      max-width: 720px;
      margin: 0 auto;
      padding: 20px;
    }
    h2 {
      color: #1e40af;
      border-bottom: 2px solid #e5e7eb;
    }
    .updated, .empty, footer {
      color: #6b7280;
      font-size: 0.875rem;
    }
  </style>
</head>
<body>
  <h1>${input.siteTitle}</h1>
  <section>
    <h2>Catalog</h2>
    ${feedList(catalog)}
  </section>
  <section>
    <h2>Channels</h2>
    ${feedList(channels)}
  </section>
  <footer>Generated ${input.generatedAt.toISOString()} · <a href="status.json">status</a></footer>
</body>
</html>
`;
  return page.toString();
}

export function buildIndexXml(input: IndexInput): string {
  const items = input.feeds.map((feed) => [
    `<title>${escapeXml(feed.title)}</title>`,
    `<link>${escapeXml(feed.href)}</link>`,
    `<guid isPermaLink="false">feed:${escapeXml(feed.href)}</guid>`,
    `<pubDate>${toRfc822(feed.lastSuccessAt ?? undefined, input.generatedAt)}</pubDate>`,
  ]);

  return renderRss(
    {
      title: input.siteTitle,
      link: INDEX_HTML,
      description: `Feeds published by ${input.siteTitle}`,
      lastBuildDate: input.generatedAt,
    },
    items
  );
}

export async function writeIndex(output: OutputWriter, input: IndexInput): Promise<void> {
  await output.write(INDEX_HTML, await buildIndexHtml(input));
  await output.write(INDEX_XML, buildIndexXml(input));
}
