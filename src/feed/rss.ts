import { format, isValid, parseISO, subDays } from 'date-fns';
import { XMLBuilder } from 'fast-xml-parser';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { NOT_AVAILABLE } from '../types.js';
import type { JobRecord } from '../types.js';

export interface RssChannel {
  title: string;
  link: string;
  description: string;
}

export const DEFAULT_CHANNEL: RssChannel = {
  title: 'Victorian Councils Job Feed',
  link: 'https://bandsight.github.io/vic/',
  description: 'Latest jobs from Victorian councils.',
};

export interface RssOptions {
  now?: Date;
  lookbackDays?: number;
  channel?: RssChannel;
}

export type FeedJob = Pick<
  JobRecord,
  'title' | 'council' | 'detail_url' | 'description' | 'posted_date' | 'scraped_at' | 'reference_number'
>;

const DESCRIPTION_PREVIEW_LENGTH = 200;

function parseDate(value: string): Date | null {
  if (!value || value === NOT_AVAILABLE) {
    return null;
  }
  const parsed = parseISO(value);
  return isValid(parsed) ? parsed : null;
}

function rfc822(date: Date): string {
  return format(date, 'EEE, dd MMM yyyy HH:mm:ss xx');
}

/** Jobs posted after `now - lookbackDays`; jobs without a posted date are left out. */
export function selectRecentJobs<T extends FeedJob>(jobs: T[], now: Date, lookbackDays: number): T[] {
  const cutoff = subDays(now, lookbackDays);
  return jobs.filter((job) => {
    const posted = parseDate(job.posted_date);
    return posted !== null && posted > cutoff;
  });
}

function toItem(job: FeedJob): Record<string, unknown> {
  const published = parseDate(job.posted_date) ?? parseDate(job.scraped_at);
  return {
    title: `${job.council} - ${job.title}`,
    link: job.detail_url,
    description: `${job.description.slice(0, DESCRIPTION_PREVIEW_LENGTH)}...`,
    pubDate: published ? rfc822(published) : job.scraped_at,
    category: job.council,
    guid: {
      '@_isPermaLink': 'false',
      '#text': job.reference_number,
    },
  };
}

export function generateRss(jobs: FeedJob[], options: RssOptions = {}): string {
  const now = options.now ?? new Date();
  const channel = options.channel ?? DEFAULT_CHANNEL;
  const items = selectRecentJobs(jobs, now, options.lookbackDays ?? 30).map((job) => toItem(job));

  const channelNode: Record<string, unknown> = {
    title: channel.title,
    link: channel.link,
    description: channel.description,
    pubDate: rfc822(now),
  };
  if (items.length > 0) {
    channelNode.item = items;
  }

  const builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    format: true,
    indentBy: '  ',
    suppressEmptyNode: true,
  });
  return builder.build({
    '?xml': { '@_version': '1.0', '@_encoding': 'UTF-8' },
    rss: {
      '@_version': '2.0',
      channel: channelNode,
    },
  });
}

export async function writeRss(filePath: string, xml: string): Promise<void> {
  const dir = dirname(filePath);
  if (dir && dir !== '.') {
    await mkdir(dir, { recursive: true });
  }
  await writeFile(filePath, xml, 'utf8');
}
