import { errorMessage, type JobContext } from '@cinefeed/shared';
import { normalizeChannelName, withTimeout, type ChannelRenderer } from '@cinefeed/scraper';
import type { AppConfig } from '../config.js';
import { buildChannelFeed, channelFeedFilename } from '../feed/rss.js';
import type { OutputWriter } from '../output.js';
import { closeRenderer, type JobOutput } from './job.js';

export interface ChannelSyncDeps {
  config: AppConfig;
  createRenderer: () => ChannelRenderer;
  output: OutputWriter;
  now?: () => Date;
}

/**
 * Publish one feed per configured channel. A failing channel is logged and
 * skipped; the others are still published.
 */
export async function runChannelSync(ctx: JobContext, deps: ChannelSyncDeps): Promise<JobOutput> {
  const { config, output } = deps;
  const now = deps.now ?? (() => new Date());
  const { names, postLimit } = config.channels;

  let published = 0;
  let posts = 0;
  const failures: string[] = [];

  const renderer = deps.createRenderer();
  try {
    for (const raw of names) {
      try {
        const channel = normalizeChannelName(raw);
        const page = await withTimeout(
          (signal) => renderer.renderChannel(channel, signal),
          config.fetch.renderTimeoutMs,
          `channel ${channel}`
        );
        await output.write(channelFeedFilename(channel), buildChannelFeed(page, { now: now(), postLimit }));

        const written = Math.min(page.posts.length, postLimit);
        published++;
        posts += written;
        ctx.logger.info({ channel, posts: written }, 'channel_feed_written');
      } catch (error) {
        failures.push(`${raw}: ${errorMessage(error)}`);
        ctx.logger.error({ err: error, channel: raw }, 'channel_sync_failed');
      }
    }
  } finally {
    await closeRenderer(renderer, ctx);
  }

  return {
    status: failures.length > 0 ? 'partial' : 'ok',
    counts: {
      channels: names.length,
      published,
      failed: failures.length,
      posts,
    },
    ...(failures.length > 0 ? { error: failures.join('; ') } : {}),
  };
}
