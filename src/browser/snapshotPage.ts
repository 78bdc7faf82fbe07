import * as cheerio from 'cheerio';
import { readFile } from 'node:fs/promises';
import { normalizeWhitespace } from '../utils/text.js';
import type { ClickableRole, DetailPage } from './types.js';

const BLOCK_TAGS =
  'address,article,aside,blockquote,dd,div,dl,dt,fieldset,figcaption,figure,footer,form,' +
  'h1,h2,h3,h4,h5,h6,header,hr,li,main,nav,ol,p,pre,section,table,tr,ul';

function renderedText(html: string): string {
  const $ = cheerio.load(html, null, false);
  $('script, style, noscript').remove();
  $('br').replaceWith('\n');
  $(BLOCK_TAGS).each((_, block) => {
    $(block).append('\n');
  });
  return $.root()
    .text()
    .split('\n')
    .map((line) => normalizeWhitespace(line))
    .filter(Boolean)
    .join('\n');
}

/**
 * A detail page replayed from captured HTML. Text is read the way a browser
 * renders it: one line per block element, whitespace collapsed within lines.
 * Nothing is clickable.
 */
export class SnapshotPage implements DetailPage {
  private readonly $: cheerio.CheerioAPI;

  constructor(
    html: string,
    private readonly pageUrl: string,
  ) {
    this.$ = cheerio.load(html);
  }

  static async fromFile(filePath: string, pageUrl: string): Promise<SnapshotPage> {
    return new SnapshotPage(await readFile(filePath, 'utf8'), pageUrl);
  }

  url(): string {
    return this.pageUrl;
  }

  async textsOf(selector: string): Promise<string[]> {
    return this.$(selector)
      .map((_, element) => renderedText(this.$.html(element)))
      .get();
  }

  async firstTextMatching(pattern: RegExp): Promise<string | null> {
    let found: string | null = null;
    this.$('body *').each((_, element) => {
      const node = this.$(element);
      if (node.is('script, style, noscript')) {
        return;
      }
      if (!pattern.test(normalizeWhitespace(node.text()))) {
        return;
      }
      const childMatches = node
        .children()
        .toArray()
        .some((child) => pattern.test(normalizeWhitespace(this.$(child).text())));
      if (childMatches) {
        return;
      }
      found = renderedText(this.$.html(element)) || null;
      return false;
    });
    return found;
  }

  async bodyText(): Promise<string> {
    return renderedText(this.$('body').html() ?? '');
  }

  async hrefsOf(selector: string): Promise<string[]> {
    return this.$(selector)
      .map((_, element) => this.$(element).attr('href') ?? '')
      .get();
  }

  async listItemsUnderHeadings(headingSelector: string, keywords: string[]): Promise<string[]> {
    const lowered = keywords.map((keyword) => keyword.toLowerCase());
    const items: string[] = [];
    this.$(headingSelector).each((_, element) => {
      const heading = this.$(element);
      const text = heading.text().trim().toLowerCase();
      if (!text || !lowered.some((keyword) => text.includes(keyword))) {
        return;
      }
      heading
        .nextAll('ul, ol')
        .first()
        .find('li')
        .each((__, item) => {
          const value = normalizeWhitespace(this.$(item).text());
          if (value) {
            items.push(value);
          }
        });
    });
    return items;
  }

  async clickAll(_role: ClickableRole, _name: RegExp): Promise<number> {
    return 0;
  }

  async close(): Promise<void> {}
}
