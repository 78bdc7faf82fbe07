export type ClickableRole = 'button' | 'link';

/**
 * What the detail-page extractors need from a loaded page. Implemented over
 * a live Playwright page and over captured HTML for replays and tests.
 */
export interface DetailPage {
  url(): string;
  /** Inner text of every element matching `selector`, in document order. */
  textsOf(selector: string): Promise<string[]>;
  /** Text of the first (innermost) element whose text matches `pattern`, or null. */
  firstTextMatching(pattern: RegExp): Promise<string | null>;
  /** Full visible body text with one line per block. */
  bodyText(): Promise<string>;
  /** Raw `href` attributes of every element matching `selector`. */
  hrefsOf(selector: string): Promise<string[]>;
  /**
   * List-item texts of the first `ul`/`ol` sibling that follows each heading
   * matched by `headingSelector` whose text contains one of `keywords`.
   */
  listItemsUnderHeadings(headingSelector: string, keywords: string[]): Promise<string[]>;
  /** Clicks every element with `role` whose accessible name matches; returns the number clicked. */
  clickAll(role: ClickableRole, name: RegExp): Promise<number>;
  close(): Promise<void>;
}

export type OpenDetailPage = (url: string) => Promise<DetailPage>;
