import type { Page } from 'playwright-core';
import type { CatalogEntry, SessionSlot } from '@cinefeed/shared';
import { BrowserManager } from './browser.js';
import { canonicalizeUrl, normalizeSpace } from './parser.js';
import type { PageRenderer } from './types.js';

export interface CineplexxRendererConfig {
  baseUrl: string;
  location: string;
  navigationTimeoutMs?: number;
}

const COOKIE_OVERLAY_IDS = ['CybotCookiebotDialog', 'CybotCookiebotDialogBodyUnderlay'];

/**
 * Page renderer for the Cineplexx site, which is a single page application:
 * every page has to be rendered before film links or sessions appear.
 */
export class CineplexxRenderer implements PageRenderer {
  private readonly baseUrl: string;
  private readonly navigationTimeoutMs: number;

  constructor(
    private readonly config: CineplexxRendererConfig,
    private readonly browser: BrowserManager = new BrowserManager()
  ) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.navigationTimeoutMs = config.navigationTimeoutMs ?? 60000;
  }

  listingUrl(date: string): string {
    return `${this.baseUrl}/cinemas?location=${encodeURIComponent(this.config.location)}&date=${date}`;
  }

  scheduleUrl(canonicalUrl: string, date: string, location: string): string {
    return `${canonicalUrl}?date=${date}&location=${encodeURIComponent(location)}`;
  }

  async renderListing(date: string, signal?: AbortSignal): Promise<CatalogEntry[]> {
    return this.browser.withPage(async (page) => {
      await page.goto(this.listingUrl(date), {
        waitUntil: 'domcontentloaded',
        timeout: this.navigationTimeoutMs,
      });
      await page.waitForSelector('a[href*="/film/"]', { timeout: 30000 });

      const raw = await page.evaluate(() => {
        const anchors = Array.from(document.querySelectorAll<HTMLAnchorElement>('a[href*="/film/"]'));
        const results: Array<{ title: string; href: string }> = [];

        for (const a of anchors) {
          const href = a.getAttribute('href') ?? '';
          if (!href.includes('/film/')) continue;

          const candidates = [
            a.innerText,
            a.getAttribute('aria-label'),
            a.getAttribute('title'),
            a.querySelector('[data-title]')?.getAttribute('data-title'),
            a.querySelector<HTMLElement>('.movie-title,.movie__title,.film-title,.film__title')?.innerText,
            a.querySelector('img')?.getAttribute('alt'),
            a.querySelector('img')?.getAttribute('title'),
          ];

          let title = '';
          for (const candidate of candidates) {
            const text = (candidate ?? '').trim();
            if (text.length >= 2) {
              title = text;
              break;
            }
          }
          if (!title) continue;

          const absolute = href.startsWith('http') ? href : window.location.origin + href;
          results.push({ title, href: absolute });
        }

        return results;
      });

      return raw.map((item) => ({
        title: normalizeSpace(item.title),
        canonicalUrl: canonicalizeUrl(item.href),
      }));
    }, signal);
  }

  async renderDescription(canonicalUrl: string, signal?: AbortSignal): Promise<string> {
    return this.browser.withPage(async (page) => {
      await page.goto(canonicalUrl, { waitUntil: 'networkidle', timeout: this.navigationTimeoutMs });
      await removeCookieOverlay(page);
      await page.waitForSelector('.b-movie-description__text, .b-movie-description', { timeout: 8000 });

      // Collapsed descriptions only render their first paragraph
      const expand = page.locator('.b-movie-description__btn');
      if ((await expand.count()) > 0) {
        await removeCookieOverlay(page);
        await expand.first().click({ timeout: 3000 }).catch(() => undefined);
        await page.waitForTimeout(500);
      }

      for (let attempt = 0; attempt < 3; attempt++) {
        const paragraphs = await page.$$eval('.b-movie-description__text', (els) =>
          els.map((el) => (el instanceof HTMLElement ? el.innerText : el.textContent ?? '').trim()).filter(Boolean).join('\n\n')
        );
        if (paragraphs) return normalizeSpace(paragraphs);

        const block = await page.$eval('.b-movie-description', (el) =>
          el instanceof HTMLElement ? el.innerText : el.textContent ?? ''
        ).catch(() => '');
        if (block.trim()) return normalizeSpace(block);

        await page.waitForTimeout(1000);
      }

      return '';
    }, signal);
  }

  async renderSchedule(canonicalUrl: string, date: string, location: string, signal?: AbortSignal): Promise<SessionSlot[]> {
    return this.browser.withPage(async (page) => {
      await page.goto(this.scheduleUrl(canonicalUrl, date, location), {
        waitUntil: 'networkidle',
        timeout: this.navigationTimeoutMs,
      });

      const raw = await page.evaluate(() => {
        const text = (el: Element | null): string =>
          el instanceof HTMLElement ? el.innerText.trim() : (el?.textContent ?? '').trim();

        return Array.from(document.querySelectorAll('li[data-session-id]')).map((li) => {
          let info = '';
          for (const el of Array.from(li.querySelectorAll('p.l-tickets__item-info'))) {
            info = text(el);
            if (info) break;
          }

          let purchaseUrl = li.querySelector('a[href]')?.getAttribute('href') ?? '';
          if (purchaseUrl.startsWith('//')) purchaseUrl = 'https:' + purchaseUrl;
          else if (purchaseUrl.startsWith('/')) purchaseUrl = window.location.origin + purchaseUrl;

          let venueName = '';
          const wrapper = li.closest('div[id^="data-"]');
          if (wrapper && wrapper.id) {
            venueName = wrapper.id.replace(/^data-/, '').replace(/-/g, ' ').trim();
          }
          if (!venueName) {
            venueName = text(document.querySelector('a.b-entity-content__title, a.b-entity-content__link'));
          }

          return {
            sessionId: li.getAttribute('data-session-id') ?? '',
            time: text(li.querySelector('p.l-tickets__item-time')),
            hall: text(li.querySelector('p.l-tickets__item-cinema')),
            info,
            venueName,
            purchaseUrl,
          };
        });
      });

      return raw.map((slot) => ({ ...slot, date }));
    }, signal);
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}

async function removeCookieOverlay(page: Page): Promise<void> {
  await page
    .evaluate((ids: string[]) => {
      for (const id of ids) {
        document.getElementById(id)?.remove();
      }
      document.body.style.overflow = 'auto';
    }, COOKIE_OVERLAY_IDS)
    .catch(() => undefined);
}
