import { XMLParser } from 'fast-xml-parser';
import { describe, expect, it } from 'vitest';
import { generateRss, selectRecentJobs } from '../../src/feed/rss.js';
import { makeJob } from '../helpers/jobs.js';

const NOW = new Date(2024, 0, 31, 12, 0, 0);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  isArray: (name) => name === 'item',
});

function parseFeed(xml: string): { channel: Record<string, unknown>; items: Array<Record<string, unknown>> } {
  const parsed: unknown = parser.parse(xml);
  const rss = typeof parsed === 'object' && parsed !== null ? Reflect.get(parsed, 'rss') : undefined;
  const channel: unknown = typeof rss === 'object' && rss !== null ? Reflect.get(rss, 'channel') : undefined;
  if (typeof channel !== 'object' || channel === null) {
    throw new Error('Feed has no channel');
  }
  const items: unknown = Reflect.get(channel, 'item') ?? [];
  return {
    channel: { ...channel },
    items: Array.isArray(items) ? items : [],
  };
}

describe('selectRecentJobs', () => {
  it('keeps jobs posted inside the lookback window', () => {
    const jobs = [
      makeJob({ reference_number: 'recent', posted_date: '2024-01-21T12:00:00' }),
      makeJob({ reference_number: 'old', posted_date: '2023-12-22T12:00:00' }),
      makeJob({ reference_number: 'undated', posted_date: 'N/A' }),
    ];
    expect(selectRecentJobs(jobs, NOW, 30).map((job) => job.reference_number)).toEqual(['recent']);
  });
});

describe('generateRss', () => {
  it('publishes only recent jobs', () => {
    const xml = generateRss(
      [
        makeJob({ title: 'Recent Role', reference_number: 'recent-ref', posted_date: '2024-01-21T12:00:00' }),
        makeJob({ title: 'Old Role', reference_number: 'old-ref', posted_date: '2023-12-22T12:00:00' }),
      ],
      { now: NOW },
    );
    const { items } = parseFeed(xml);

    expect(items).toHaveLength(1);
    expect(items[0]?.title).toBe('City of Ballarat - Recent Role');
  });

  it('describes each item', () => {
    const description = 'x'.repeat(250);
    const xml = generateRss(
      [
        makeJob({
          title: 'Planner',
          detail_url: 'https://council.example/job/1',
          description,
          reference_number: 'REF-9',
          posted_date: '2024-01-30',
        }),
      ],
      { now: NOW },
    );
    const [item] = parseFeed(xml).items;

    expect(item).toMatchObject({
      link: 'https://council.example/job/1',
      description: `${'x'.repeat(200)}...`,
      category: 'City of Ballarat',
      guid: { '@_isPermaLink': 'false', '#text': 'REF-9' },
    });
    expect(item?.pubDate).toMatch(/^Tue, 30 Jan 2024 00:00:00 [+-]\d{4}$/);
  });

  it('writes the channel header even without items', () => {
    const xml = generateRss([], {
      now: NOW,
      channel: { title: 'Test feed', link: 'https://feeds.example/', description: 'Testing' },
    });
    const { channel, items } = parseFeed(xml);

    expect(xml.startsWith('<?xml version="1.0" encoding="UTF-8"?>')).toBe(true);
    expect(channel).toMatchObject({ title: 'Test feed', link: 'https://feeds.example/', description: 'Testing' });
    expect(items).toEqual([]);
  });

  it('honours a custom lookback', () => {
    const jobs = [makeJob({ posted_date: '2024-01-21' })];
    expect(parseFeed(generateRss(jobs, { now: NOW, lookbackDays: 5 })).items).toEqual([]);
  });
});
