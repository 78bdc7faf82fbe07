import type { AppJobEntry, RowSnapshot } from '../../src/harvest/candidates.js';
import type { ListingDriver } from '../../src/harvest/listing.js';

export interface FakeListingOptions {
  appJobs?: AppJobEntry[] | Error;
  rows?: RowSnapshot[] | Error;
  gotoError?: Error;
  hookExists?: boolean;
  rowsTimeout?: boolean;
}

/** Listing driver that replays canned app data and rows, recording each call. */
export class FakeListingDriver implements ListingDriver {
  readonly calls: string[] = [];

  constructor(private readonly options: FakeListingOptions = {}) {}

  async goto(url: string): Promise<void> {
    this.calls.push(`goto ${url}`);
    if (this.options.gotoError) {
      throw this.options.gotoError;
    }
  }

  async waitForDomContent(): Promise<void> {
    this.calls.push('waitForDomContent');
  }

  async title(): Promise<string> {
    return 'Current vacancies';
  }

  async triggerLoad(hookName: string): Promise<boolean> {
    this.calls.push(`triggerLoad ${hookName}`);
    return this.options.hookExists ?? true;
  }

  async waitForRows(rowSelector: string, minRows: number): Promise<void> {
    this.calls.push(`waitForRows ${rowSelector} ${minRows}`);
    if (this.options.rowsTimeout) {
      throw new Error('Timeout waiting for rows');
    }
  }

  async screenshot(filePath: string): Promise<void> {
    this.calls.push(`screenshot ${filePath}`);
  }

  async scrollToBottom(): Promise<void> {
    this.calls.push('scroll');
  }

  async readAppJobs(): Promise<AppJobEntry[]> {
    this.calls.push('readAppJobs');
    const { appJobs = [] } = this.options;
    if (appJobs instanceof Error) {
      throw appJobs;
    }
    return appJobs;
  }

  async readRows(): Promise<RowSnapshot[]> {
    this.calls.push('readRows');
    const { rows = [] } = this.options;
    if (rows instanceof Error) {
      throw rows;
    }
    return rows;
  }
}

export function appJob(linkId: string, title: string, info: Record<string, string> = {}): AppJobEntry {
  return {
    job: { LinkId: linkId, JobInfo: { Title: title, ...info } },
    href: `/Pulse/jobs/job/${linkId}/${title.toLowerCase().replace(/\s+/g, '-')}`,
  };
}
