import { z } from 'zod';
import { ConfigurationError, type ChannelPage, type ChannelPost } from '@cinefeed/shared';
import { BrowserManager } from './browser.js';
import type { ChannelRenderer } from './types.js';

const CHANNEL_NAME = /^[A-Za-z][A-Za-z0-9_]{4,31}$/;

/**
 * Accepts `name`, `@name` or a t.me link and returns the bare channel name
 */
export function normalizeChannelName(input: string): string {
  const trimmed = input.trim();
  const name = trimmed
    .replace(/^https?:\/\//i, '')
    .replace(/^(?:www\.)?t(?:elegram)?\.me\/(?:s\/)?/i, '')
    .replace(/^@/, '')
    .replace(/[/?#].*$/, '');

  if (!CHANNEL_NAME.test(name)) {
    throw new ConfigurationError(`invalid channel name: ${JSON.stringify(input)}`);
  }
  return name;
}

const RawPostSchema = z.object({
  id: z.string(),
  url: z.string(),
  datetime: z.string(),
  html: z.string(),
  text: z.string(),
});

const RawChannelSchema = z.object({
  title: z.string(),
  description: z.string(),
  posts: z.array(RawPostSchema),
});

export type RawChannel = z.infer<typeof RawChannelSchema>;

function postNumber(id: string): number {
  const n = Number(id.slice(id.lastIndexOf('/') + 1));
  return Number.isFinite(n) ? n : 0;
}

/**
 * Turns extracted preview markup into posts, newest first.
 * Posts without an id or a parsable timestamp are skipped.
 */
export function toChannelPage(channel: string, raw: unknown): ChannelPage {
  const parsed = RawChannelSchema.parse(raw);
  const posts: ChannelPost[] = [];
  const seen = new Set<string>();

  for (const post of parsed.posts) {
    if (!post.id || seen.has(post.id)) continue;
    const published = new Date(post.datetime);
    if (Number.isNaN(published.getTime())) continue;
    seen.add(post.id);
    posts.push({
      id: post.id,
      url: post.url || `https://t.me/${post.id}`,
      publishedAt: published.toISOString(),
      html: post.html.trim(),
      text: post.text.trim(),
    });
  }

  posts.sort((a, b) => postNumber(b.id) - postNumber(a.id));

  return {
    channel,
    title: parsed.title.trim() || channel,
    description: parsed.description.trim(),
    posts,
  };
}

export interface TelegramRendererConfig {
  navigationTimeoutMs?: number;
}

/**
 * Reads the public web preview (t.me/s/<channel>) of a Telegram channel.
 */
export class TelegramRenderer implements ChannelRenderer {
  constructor(
    private readonly config: TelegramRendererConfig = {},
    private readonly browser: BrowserManager = new BrowserManager()
  ) {}

  async renderChannel(channel: string, signal?: AbortSignal): Promise<ChannelPage> {
    const name = normalizeChannelName(channel);

    return this.browser.withPage(async (page) => {
      await page.goto(`https://t.me/s/${name}`, {
        waitUntil: 'domcontentloaded',
        timeout: this.config.navigationTimeoutMs ?? 60000,
      });

      const raw = await page.evaluate(() => {
        const text = (el: Element | null | undefined): string => (el?.textContent ?? '').trim();

        const posts = Array.from(document.querySelectorAll('.tgme_widget_message[data-post]')).map((el) => {
          const body = el.querySelector('.tgme_widget_message_text');
          const link = el.querySelector<HTMLAnchorElement>('a.tgme_widget_message_date');
          return {
            id: el.getAttribute('data-post') ?? '',
            url: link?.href ?? '',
            datetime: el.querySelector('.tgme_widget_message_date time')?.getAttribute('datetime') ?? '',
            html: body?.innerHTML ?? '',
            text: text(body),
          };
        });

        return {
          title: text(document.querySelector('.tgme_channel_info_header_title')),
          description: text(document.querySelector('.tgme_channel_info_description')),
          posts,
        };
      });

      return toChannelPage(name, raw);
    }, signal);
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}
