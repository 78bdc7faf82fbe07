import type { BrowserContext, Page } from 'playwright';
import type { Logger } from '../utils/logger.js';
import type { ClickableRole, DetailPage, OpenDetailPage } from './types.js';

export interface PlaywrightDetailPageOptions {
  clickTimeoutMs: number;
  settleAfterClickMs?: number;
  logger?: Logger;
}

export class PlaywrightDetailPage implements DetailPage {
  constructor(
    private readonly page: Page,
    private readonly options: PlaywrightDetailPageOptions,
  ) {}

  url(): string {
    return this.page.url();
  }

  textsOf(selector: string): Promise<string[]> {
    return this.page.locator(selector).allInnerTexts();
  }

  async firstTextMatching(pattern: RegExp): Promise<string | null> {
    const matches = this.page.getByText(pattern);
    if ((await matches.count()) === 0) {
      return null;
    }
    const text = (await matches.first().innerText()).trim();
    return text || null;
  }

  bodyText(): Promise<string> {
    return this.page.innerText('body');
  }

  hrefsOf(selector: string): Promise<string[]> {
    return this.page.$$eval(selector, (elements) => elements.map((element) => element.getAttribute('href') ?? ''));
  }

  listItemsUnderHeadings(headingSelector: string, keywords: string[]): Promise<string[]> {
    return this.page.evaluate(
      ({ selector, words }) => {
        const lowered = words.map((word) => word.toLowerCase());
        const items: string[] = [];
        for (const node of Array.from(document.querySelectorAll(selector))) {
          const text = (node.textContent ?? '').trim().toLowerCase();
          if (!text || !lowered.some((word) => text.includes(word))) {
            continue;
          }
          let sibling = node.nextElementSibling;
          while (sibling && sibling.tagName !== 'UL' && sibling.tagName !== 'OL') {
            sibling = sibling.nextElementSibling;
          }
          if (!sibling) {
            continue;
          }
          for (const item of Array.from(sibling.querySelectorAll('li'))) {
            const value = (item.textContent ?? '').replace(/\s+/g, ' ').trim();
            if (value) {
              items.push(value);
            }
          }
        }
        return items;
      },
      { selector: headingSelector, words: keywords },
    );
  }

  async clickAll(role: ClickableRole, name: RegExp): Promise<number> {
    const targets = this.page.getByRole(role, { name });
    const count = await targets.count();
    let clicked = 0;
    for (let index = 0; index < count; index += 1) {
      try {
        await targets.nth(index).click({ timeout: this.options.clickTimeoutMs });
        clicked += 1;
        await this.page.waitForTimeout(this.options.settleAfterClickMs ?? 200);
      } catch (error) {
        this.options.logger?.debug(`Click on ${role} ${index + 1}/${count} (${name.source}) failed: ${String(error)}`);
      }
    }
    return clicked;
  }

  close(): Promise<void> {
    return this.page.close();
  }
}

export interface DetailPageFactoryOptions {
  navigationTimeoutMs: number;
  loadStateTimeoutMs: number;
  clickTimeoutMs: number;
  logger?: Logger;
}

/** Opens each detail URL in a fresh tab of `context`; the caller closes it. */
export function playwrightDetailPageOpener(context: BrowserContext, options: DetailPageFactoryOptions): OpenDetailPage {
  return async (url) => {
    const page = await context.newPage();
    try {
      await page.goto(url, { timeout: options.navigationTimeoutMs });
      await page.waitForLoadState('domcontentloaded', { timeout: options.loadStateTimeoutMs });
    } catch (error) {
      await page.close();
      throw error;
    }
    return new PlaywrightDetailPage(page, { clickTimeoutMs: options.clickTimeoutMs, logger: options.logger });
  };
}
