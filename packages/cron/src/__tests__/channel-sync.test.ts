import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { pino } from 'pino';
import { createJobContext, type ChannelPage } from '@cinefeed/shared';
import type { ChannelRenderer } from '@cinefeed/scraper';
import { ConfigSchema, type AppConfig } from '../config.js';
import { runChannelSync } from '../jobs/channel-sync.js';
import { OutputWriter } from '../output.js';

const logger = pino({ level: 'silent' });
const ctx = createJobContext(logger, 'run-1', 'channels');
const NOW = new Date('2026-01-04T12:00:00.000Z');

function page(channel: string, postCount: number): ChannelPage {
  return {
    channel,
    title: `${channel} title`,
    description: '',
    posts: Array.from({ length: postCount }, (_, i) => ({
      id: `${channel}/${postCount - i}`,
      url: `https://t.me/${channel}/${postCount - i}`,
      publishedAt: '2026-01-03T09:00:00.000Z',
      html: `post ${postCount - i}`,
      text: `post ${postCount - i}`,
    })),
  };
}

class FakeChannelRenderer implements ChannelRenderer {
  calls: string[] = [];
  closed = false;
  active = 0;
  maxActive = 0;
  activeAtClose = 0;

  constructor(
    private readonly pages: Record<string, ChannelPage | Error | 'hang' | 'slow'>,
    private readonly slowMs = 60
  ) {}

  async renderChannel(channel: string, signal?: AbortSignal): Promise<ChannelPage> {
    this.calls.push(channel);
    const result = this.pages[channel];
    if (result === undefined) throw new Error(`unknown channel ${channel}`);
    if (result === 'hang') {
      return new Promise<ChannelPage>((_, reject) => {
        signal?.addEventListener('abort', () => reject(new Error('page closed')), { once: true });
      });
    }
    if (result === 'slow') {
      // Ignores the abort and finishes late
      this.active++;
      this.maxActive = Math.max(this.maxActive, this.active);
      await new Promise((resolve) => setTimeout(resolve, this.slowMs));
      this.active--;
      return page(channel, 1);
    }
    if (result instanceof Error) throw result;
    return result;
  }

  async close(): Promise<void> {
    this.activeAtClose = this.active;
    this.closed = true;
  }
}

describe('runChannelSync', () => {
  let dir: string;
  let output: OutputWriter;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'cinefeed-channels-'));
    output = new OutputWriter(dir, logger);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function configFor(names: string[], overrides: { renderTimeoutMs?: number } = {}): AppConfig {
    return ConfigSchema.parse({
      channels: { names, postLimit: 2 },
      fetch: { renderTimeoutMs: overrides.renderTimeoutMs ?? 1000 },
      output: { outDir: dir },
    });
  }

  it('should publish one feed per channel', async () => {
    const renderer = new FakeChannelRenderer({ first_chan: page('first_chan', 3), second_chan: page('second_chan', 1) });

    const result = await runChannelSync(ctx, {
      config: configFor(['first_chan', '@second_chan']),
      createRenderer: () => renderer,
      output,
      now: () => NOW,
    });

    expect(result).toEqual({
      status: 'ok',
      counts: { channels: 2, published: 2, failed: 0, posts: 3 },
    });
    expect(renderer.calls).toEqual(['first_chan', 'second_chan']);
    expect(renderer.closed).toBe(true);
    expect((await readdir(dir)).sort()).toEqual(['telegram_first_chan.xml', 'telegram_second_chan.xml']);

    const feed = await readFile(join(dir, 'telegram_first_chan.xml'), 'utf-8');
    expect(feed).toContain('<title>first_chan title</title>');
    expect(feed).toContain('<guid isPermaLink="true">https://t.me/first_chan/3</guid>');
    expect(feed).not.toContain('https://t.me/first_chan/1<');
  });

  it('should isolate failing channels and report partial', async () => {
    const renderer = new FakeChannelRenderer({
      good_chan: page('good_chan', 1),
      broken_chan: new Error('navigation failed'),
    });

    const result = await runChannelSync(ctx, {
      config: configFor(['broken_chan', 'bad name', 'good_chan']),
      createRenderer: () => renderer,
      output,
      now: () => NOW,
    });

    expect(result).toEqual({
      status: 'partial',
      counts: { channels: 3, published: 1, failed: 2, posts: 1 },
      error: 'broken_chan: navigation failed; bad name: invalid channel name: "bad name"',
    });
    expect(await readdir(dir)).toEqual(['telegram_good_chan.xml']);
  });

  it('should report partial when every channel fails', async () => {
    const result = await runChannelSync(ctx, {
      config: configFor(['broken_chan']),
      createRenderer: () => new FakeChannelRenderer({ broken_chan: new Error('boom') }),
      output,
      now: () => NOW,
    });

    expect(result.status).toBe('partial');
    expect(result.counts.failed).toBe(1);
  });

  it('should time out a channel that never renders', async () => {
    const result = await runChannelSync(ctx, {
      config: configFor(['slow_chan', 'fast_chan'], { renderTimeoutMs: 20 }),
      createRenderer: () => new FakeChannelRenderer({ slow_chan: 'hang', fast_chan: page('fast_chan', 1) }),
      output,
      now: () => NOW,
    });

    expect(result.counts).toEqual({ channels: 2, published: 1, failed: 1, posts: 1 });
    expect(result.error).toBe('slow_chan: Timeout: channel slow_chan exceeded 20ms');
  });

  it('should not start the next channel while a timed-out one is still rendering', async () => {
    const renderer = new FakeChannelRenderer({ slow_one: 'slow', slow_two: 'slow' });

    const result = await runChannelSync(ctx, {
      config: configFor(['slow_one', 'slow_two'], { renderTimeoutMs: 20 }),
      createRenderer: () => renderer,
      output,
      now: () => NOW,
    });

    expect(result.counts).toEqual({ channels: 2, published: 0, failed: 2, posts: 0 });
    expect(renderer.calls).toEqual(['slow_one', 'slow_two']);
    expect(renderer.maxActive).toBe(1);
    expect(renderer.closed).toBe(true);
    expect(renderer.activeAtClose).toBe(0);
  });

  it('should succeed with nothing to do when no channels are configured', async () => {
    const result = await runChannelSync(ctx, {
      config: configFor([]),
      createRenderer: () => new FakeChannelRenderer({}),
      output,
    });

    expect(result).toEqual({ status: 'ok', counts: { channels: 0, published: 0, failed: 0, posts: 0 } });
  });
});
