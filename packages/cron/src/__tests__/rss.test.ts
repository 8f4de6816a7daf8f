import { describe, it, expect } from 'vitest';
import { createHash } from 'node:crypto';
import { XMLValidator } from 'fast-xml-parser';
import type { ChangeEvent, ChannelPage, Movie, Snapshot } from '@cinefeed/shared';
import {
  buildCatalogFeed,
  buildChannelFeed,
  cdata,
  channelFeedFilename,
  escapeXml,
  eventGuid,
  postTitle,
  toRfc822,
  type CatalogFeedInput,
} from '../feed/rss.js';

const NOW = new Date('2026-01-04T12:00:00.000Z');

const added: ChangeEvent = {
  kind: 'added',
  title: 'Alpha',
  url: 'https://c.test/film/a',
  detectedAt: '2026-01-03T10:00:00.000Z',
  location: '0',
  date: '2026-01-03',
};

const removed: ChangeEvent = {
  kind: 'removed',
  title: 'Beta & Co',
  url: 'https://c.test/film/b',
  detectedAt: '2026-01-04T10:00:00.000Z',
  location: '0',
  date: '2026-01-04',
};

const alpha: Movie = {
  title: 'Alpha',
  canonicalUrl: 'https://c.test/film/a',
  description: 'A <great> film',
  sessions: [
    {
      date: '2026-01-04',
      time: '18:00',
      hall: 'Sala 1',
      info: '3D',
      sessionId: '1',
      venueName: 'Test Venue',
      purchaseUrl: 'https://c.test/buy?s=1&x=2',
    },
  ],
};

const gamma: Movie = {
  title: 'Gamma',
  canonicalUrl: 'https://c.test/film/g',
  description: '',
  sessions: [],
};

const snapshot: Snapshot = {
  'https://c.test/film/a': {
    title: 'Alpha',
    firstSeen: '2026-01-03T10:00:00.000Z',
    lastSeen: '2026-01-04T10:00:00.000Z',
  },
};

function input(overrides: Partial<CatalogFeedInput> = {}): CatalogFeedInput {
  return {
    title: 'Test feed',
    link: 'https://c.test',
    description: 'Now showing',
    now: NOW,
    events: [added, removed],
    eventsLimit: 10,
    movies: [alpha, gamma],
    snapshot,
    ...overrides,
  };
}

function items(xml: string): string[] {
  return xml.match(/<item>[\s\S]*?<\/item>/g) ?? [];
}

function sha256(value: string): string {
  return createHash('sha256').update(value).digest('hex');
}

describe('escapeXml / cdata', () => {
  it('should escape markup characters', () => {
    expect(escapeXml('a & b <c> "d"')).toBe('a &amp; b &lt;c&gt; &quot;d&quot;');
  });

  it('should split a CDATA terminator inside the content', () => {
    expect(cdata('a]]>b')).toBe('<![CDATA[a]]]]><![CDATA[>b]]>');
  });
});

describe('toRfc822', () => {
  it('should format ISO timestamps', () => {
    expect(toRfc822('2026-01-03T10:00:00.000Z', NOW)).toBe('Sat, 03 Jan 2026 10:00:00 GMT');
  });

  it('should fall back for missing or unparseable values', () => {
    expect(toRfc822(undefined, NOW)).toBe('Sun, 04 Jan 2026 12:00:00 GMT');
    expect(toRfc822('yesterday-ish', NOW)).toBe('Sun, 04 Jan 2026 12:00:00 GMT');
  });
});

describe('eventGuid', () => {
  it('should hash kind, url and detection time', () => {
    expect(eventGuid(removed)).toBe(
      `urn:sha256:${sha256('event:removed|https://c.test/film/b|2026-01-04T10:00:00.000Z')}`
    );
  });

  it('should differ between an addition and a removal of the same url at the same time', () => {
    expect(eventGuid({ ...added, kind: 'removed' })).not.toBe(eventGuid(added));
  });
});

describe('buildCatalogFeed', () => {
  it('should produce well-formed RSS', () => {
    expect(XMLValidator.validate(buildCatalogFeed(input()))).toBe(true);
  });

  it('should write the channel header', () => {
    const lines = buildCatalogFeed(input()).split('\n');

    expect(lines.slice(0, 7)).toEqual([
      '<?xml version="1.0" encoding="UTF-8"?>',
      '<rss version="2.0" xmlns:content="http://purl.org/rss/1.0/modules/content/">',
      '<channel>',
      '<title>Test feed</title>',
      '<link>https://c.test</link>',
      '<description>Now showing</description>',
      '<lastBuildDate>Sun, 04 Jan 2026 12:00:00 GMT</lastBuildDate>',
    ]);
  });

  it('should list events newest first, before the movies', () => {
    const blocks = items(buildCatalogFeed(input()));

    expect(blocks).toHaveLength(4);
    expect(blocks[0]).toContain('<title>Removed: Beta &amp; Co</title>');
    expect(blocks[1]).toContain('<title>Added: Alpha</title>');
    expect(blocks[2]).toContain('<title>Alpha</title>');
    expect(blocks[3]).toContain('<title>Gamma</title>');
  });

  it('should render an event item', () => {
    const [first] = items(buildCatalogFeed(input()));

    expect(first).toBe(
      [
        '<item>',
        '<title>Removed: Beta &amp; Co</title>',
        '<link>https://c.test/film/b</link>',
        `<guid isPermaLink="false">urn:sha256:${sha256('event:removed|https://c.test/film/b|2026-01-04T10:00:00.000Z')}</guid>`,
        '<pubDate>Sun, 04 Jan 2026 10:00:00 GMT</pubDate>',
        '<description>Removed: Beta &amp; Co\nlocation=0, date=2026-01-04\nhttps://c.test/film/b</description>',
        '</item>',
      ].join('\n')
    );
  });

  it('should cap events at eventsLimit', () => {
    const blocks = items(buildCatalogFeed(input({ eventsLimit: 1 })));

    expect(blocks).toHaveLength(3);
    expect(blocks[0]).toContain('<title>Removed: Beta &amp; Co</title>');
    expect(blocks[1]).toContain('<title>Alpha</title>');
  });

  it('should omit events entirely when eventsLimit is 0', () => {
    const blocks = items(buildCatalogFeed(input({ eventsLimit: 0 })));

    expect(blocks).toHaveLength(2);
    expect(blocks.some((block) => block.includes('Added:'))).toBe(false);
  });

  it('should use the build time for events with an unparseable detection time', () => {
    const [first] = items(buildCatalogFeed(input({ events: [{ ...added, detectedAt: 'garbage' }] })));

    expect(first).toContain('<pubDate>Sun, 04 Jan 2026 12:00:00 GMT</pubDate>');
  });

  it('should render a movie with a permanent guid, first-seen date and session list', () => {
    const blocks = items(buildCatalogFeed(input({ events: [] })));

    expect(blocks[0]).toBe(
      [
        '<item>',
        '<title>Alpha</title>',
        '<link>https://c.test/film/a</link>',
        '<guid isPermaLink="true">https://c.test/film/a</guid>',
        '<pubDate>Sat, 03 Jan 2026 10:00:00 GMT</pubDate>',
        '<description>A &lt;great&gt; film</description>',
        '<content:encoded><![CDATA[<p>A &lt;great&gt; film</p><ul><li>2026-01-04 18:00 · Sala 1 · Test Venue · 3D <a href="https://c.test/buy?s=1&amp;x=2">Tickets</a></li></ul>]]></content:encoded>',
        '</item>',
      ].join('\n')
    );
  });

  it('should fall back to a generic description and the build time for unknown movies', () => {
    const blocks = items(buildCatalogFeed(input({ events: [] })));

    expect(blocks[1]).toContain('<pubDate>Sun, 04 Jan 2026 12:00:00 GMT</pubDate>');
    expect(blocks[1]).toContain('<description>Now showing: Gamma</description>');
    expect(blocks[1]).toContain('<content:encoded><![CDATA[]]></content:encoded>');
  });
});

describe('buildChannelFeed', () => {
  const page: ChannelPage = {
    channel: 'testchan',
    title: '',
    description: '',
    posts: [
      {
        id: 'testchan/10',
        url: 'https://t.me/testchan/10',
        publishedAt: '2026-01-03T09:00:00.000Z',
        html: '<b>Hello</b> world',
        text: 'Hello world\nsecond line',
      },
      {
        id: 'testchan/9',
        url: 'https://t.me/testchan/9',
        publishedAt: '2026-01-02T09:00:00.000Z',
        html: '',
        text: '',
      },
      {
        id: 'testchan/8',
        url: 'https://t.me/testchan/8',
        publishedAt: '2026-01-01T09:00:00.000Z',
        html: 'third',
        text: 'third',
      },
    ],
  };

  it('should produce well-formed RSS capped at the post limit', () => {
    const xml = buildChannelFeed(page, { now: NOW, postLimit: 2 });

    expect(XMLValidator.validate(xml)).toBe(true);
    expect(items(xml)).toHaveLength(2);
  });

  it('should default the header to the channel name', () => {
    const lines = buildChannelFeed(page, { now: NOW, postLimit: 2 }).split('\n');

    expect(lines.slice(3, 6)).toEqual([
      '<title>testchan</title>',
      '<link>https://t.me/s/testchan</link>',
      '<description>Telegram channel @testchan</description>',
    ]);
  });

  it('should render a post with its permalink as guid and its HTML as content', () => {
    const [first] = items(buildChannelFeed(page, { now: NOW, postLimit: 2 }));

    expect(first).toBe(
      [
        '<item>',
        '<title>Hello world</title>',
        '<link>https://t.me/testchan/10</link>',
        '<guid isPermaLink="true">https://t.me/testchan/10</guid>',
        '<pubDate>Sat, 03 Jan 2026 09:00:00 GMT</pubDate>',
        '<description>Hello world\nsecond line</description>',
        '<content:encoded><![CDATA[<b>Hello</b> world]]></content:encoded>',
        '</item>',
      ].join('\n')
    );
  });

  it('should name the file after the channel', () => {
    expect(channelFeedFilename('testchan')).toBe('telegram_testchan.xml');
  });
});

describe('postTitle', () => {
  const base = { id: 'testchan/9', url: '', publishedAt: '', html: '' };

  it('should use the post id when there is no text', () => {
    expect(postTitle({ ...base, text: '  \n ' })).toBe('Post testchan/9');
  });

  it('should truncate long first lines', () => {
    const title = postTitle({ ...base, text: 'x'.repeat(150) });

    expect(title).toBe(`${'x'.repeat(99)}…`);
  });
});
