import type { Page } from 'playwright';
import type { AppJobEntry, RowSnapshot } from '../harvest/candidates.js';
import type { ListingDriver } from '../harvest/listing.js';
import type { TenancySelectors } from '../types.js';

export class PlaywrightListingDriver implements ListingDriver {
  constructor(private readonly page: Page) {}

  async goto(url: string, timeoutMs: number): Promise<void> {
    await this.page.goto(url, { timeout: timeoutMs });
  }

  waitForDomContent(timeoutMs: number): Promise<void> {
    return this.page.waitForLoadState('domcontentloaded', { timeout: timeoutMs });
  }

  title(): Promise<string> {
    return this.page.title();
  }

  triggerLoad(hookName: string): Promise<boolean> {
    return this.page.evaluate((name) => {
      const hook: unknown = Reflect.get(window, name);
      if (typeof hook !== 'function') {
        return false;
      }
      Reflect.apply(hook, window, []);
      return true;
    }, hookName);
  }

  async waitForRows(rowSelector: string, minRows: number, timeoutMs: number): Promise<void> {
    await this.page.waitForFunction(
      ({ selector, min }) => document.querySelectorAll(selector).length >= min,
      { selector: rowSelector, min: minRows },
      { timeout: timeoutMs },
    );
  }

  async screenshot(filePath: string): Promise<void> {
    await this.page.screenshot({ path: filePath });
  }

  async scrollToBottom(): Promise<void> {
    await this.page.evaluate(() => window.scrollTo(0, document.body.scrollHeight));
  }

  /**
   * Reads the Vue component behind the job list and pairs each job with the
   * detail link of the row rendered at the same position.
   */
  readAppJobs(selectors: TenancySelectors): Promise<AppJobEntry[]> {
    return this.page.evaluate(
      ({ appRoot, row, detailLink }) => {
        const root = document.querySelector(appRoot);
        if (!root || !('__vue__' in root)) {
          return [];
        }
        const vm = root.__vue__;
        if (typeof vm !== 'object' || vm === null || !('jobs' in vm) || !Array.isArray(vm.jobs)) {
          return [];
        }
        const jobs: unknown[] = vm.jobs;
        const cards = Array.from(document.querySelectorAll(row));
        return jobs.map((job, index) => {
          const anchor = cards[index]?.querySelector(detailLink);
          const plain: unknown = JSON.parse(JSON.stringify(job));
          return {
            job: plain,
            href: anchor instanceof HTMLAnchorElement ? anchor.href : '',
          };
        });
      },
      { appRoot: selectors.appRoot, row: selectors.row, detailLink: selectors.detailLink },
    );
  }

  readRows(selectors: TenancySelectors): Promise<RowSnapshot[]> {
    return this.page.$$eval(
      selectors.row,
      (rows, { titleSelector, linkSelector }) =>
        rows.map((row) => {
          const titleNode = row.querySelector(titleSelector);
          const link = row.querySelector(linkSelector);
          return {
            title: titleNode?.textContent?.trim() ?? '',
            href: link instanceof HTMLAnchorElement ? link.href : (link?.getAttribute('href') ?? ''),
            text: row instanceof HTMLElement ? row.innerText : (row.textContent ?? ''),
          };
        }),
      { titleSelector: selectors.rowTitle, linkSelector: selectors.detailLink },
    );
  }
}
