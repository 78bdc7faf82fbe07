import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { runScrapePipeline, scrapeTenancy } from '../../src/pipeline/scrape.js';
import type { LiveScraper, PipelineOptions } from '../../src/pipeline/scrape.js';
import { FakeListingDriver, appJob } from '../helpers/listingDriver.js';
import { makeJob } from '../helpers/jobs.js';
import { createMemoryLogger } from '../helpers/logger.js';
import { snapshotOpener, testSettings, testTenancy } from '../helpers/pages.js';

const NOW = new Date('2024-08-30T00:00:00.000Z');

describe('scrapeTenancy', () => {
  it('assembles one record per harvested candidate', async () => {
    const opened: string[] = [];
    const wait = vi.fn(async (): Promise<void> => {});
    const jobs = await scrapeTenancy(testTenancy(), {
      driver: new FakeListingDriver({
        appJobs: [
          appJob('A1', 'Senior Planner', { JobRef: 'REF-A1' }),
          appJob('A2', 'Parks Officer', { JobRef: 'REF-A2' }),
        ],
      }),
      openDetailPage: snapshotOpener(opened),
      settings: testSettings({ scrollIterations: 0, interJobDelayMs: 750 }),
      logger: createMemoryLogger(),
      wait,
      now: () => NOW,
    });

    expect(jobs.map((job) => job.reference_number)).toEqual(['REF-A1', 'REF-A2']);
    expect(opened).toEqual([
      'https://ballarat.pulsesoftware.com/Pulse/jobs/job/A1/senior-planner',
      'https://ballarat.pulsesoftware.com/Pulse/jobs/job/A2/parks-officer',
    ]);
    expect(wait).toHaveBeenCalledTimes(2);
    expect(wait).toHaveBeenCalledWith(750);
  });
});

describe('runScrapePipeline', () => {
  let dir: string;
  let options: PipelineOptions;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'council-jobs-'));
    options = {
      tenancies: [testTenancy()],
      settings: testSettings(),
      outputPath: join(dir, 'jobs_output.json'),
      rssPath: join(dir, 'rss.xml'),
      now: () => NOW,
    };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function writeFixture(name: string, jobs: unknown): Promise<string> {
    const filePath = join(dir, name);
    await writeFile(filePath, JSON.stringify(jobs), 'utf8');
    return filePath;
  }

  async function readOutput(): Promise<unknown> {
    return JSON.parse(await readFile(options.outputPath, 'utf8'));
  }

  it('publishes a fixture without touching the browser', async () => {
    const fixturePath = await writeFixture('fixture.json', { jobs: [makeJob({ posted_date: '2024-08-20' })] });
    const scrapeLive = vi.fn<LiveScraper>();

    const result = await runScrapePipeline({ ...options, fixturePath }, { logger: createMemoryLogger(), scrapeLive });

    expect(scrapeLive).not.toHaveBeenCalled();
    expect(result).toMatchObject({ source: 'fixture', feedItemCount: 1 });
    expect(await readOutput()).toEqual([makeJob({ posted_date: '2024-08-20' })]);
    expect(await readFile(options.rssPath, 'utf8')).toContain('<title>City of Ballarat - Senior Planner</title>');
  });

  it('writes live results', async () => {
    const live = [makeJob({ reference_number: 'LIVE-1', posted_date: '2024-06-01' })];
    const scrapeLive = vi.fn<LiveScraper>().mockResolvedValue(live);

    const result = await runScrapePipeline(options, { logger: createMemoryLogger(), scrapeLive });

    expect(scrapeLive).toHaveBeenCalledWith(options.tenancies, options.settings, expect.anything());
    expect(result).toMatchObject({ source: 'live', feedItemCount: 0 });
    expect(await readOutput()).toEqual(live);
  });

  it('falls back to the captured fixture when the live scrape fails', async () => {
    const fallbackFixturePath = await writeFixture('fallback.json', [makeJob({ reference_number: 'FALLBACK-1' })]);
    const logger = createMemoryLogger();

    const result = await runScrapePipeline(
      { ...options, fallbackFixturePath },
      { logger, scrapeLive: vi.fn<LiveScraper>().mockRejectedValue(new Error('browser crashed')) },
    );

    expect(result.source).toBe('fallback');
    expect(result.jobs.map((job) => job.reference_number)).toEqual(['FALLBACK-1']);
    expect(logger.lines).toContain('ERROR Live scrape failed: browser crashed');
    expect(logger.lines).toContain(`WARN Falling back to fixture at ${fallbackFixturePath}`);
  });

  it('propagates the failure when fallback is disabled', async () => {
    const fallbackFixturePath = await writeFixture('fallback.json', [makeJob()]);

    await expect(
      runScrapePipeline(
        { ...options, fallbackFixturePath, disableFallback: true },
        { logger: createMemoryLogger(), scrapeLive: vi.fn<LiveScraper>().mockRejectedValue(new Error('browser crashed')) },
      ),
    ).rejects.toThrow('browser crashed');
  });

  it('propagates the failure when the fallback fixture is missing', async () => {
    await expect(
      runScrapePipeline(
        { ...options, fallbackFixturePath: join(dir, 'missing.json') },
        { logger: createMemoryLogger(), scrapeLive: vi.fn<LiveScraper>().mockRejectedValue(new Error('browser crashed')) },
      ),
    ).rejects.toThrow('browser crashed');
  });

  it('merges with the existing output when asked', async () => {
    await writeFile(
      options.outputPath,
      JSON.stringify([
        makeJob({ reference_number: 'KEEP', scraped_at: '2024-08-01T00:00:00.000Z' }),
        makeJob({ reference_number: 'UPDATE', salary: '$1', scraped_at: '2024-08-01T00:00:00.000Z' }),
      ]),
      'utf8',
    );
    const scrapeLive = vi
      .fn<LiveScraper>()
      .mockResolvedValue([makeJob({ reference_number: 'UPDATE', salary: '$2', scraped_at: '2024-08-29T00:00:00.000Z' })]);

    const result = await runScrapePipeline({ ...options, merge: true }, { logger: createMemoryLogger(), scrapeLive });

    expect(result.jobs.map((job) => [job.reference_number, job.salary])).toEqual([
      ['KEEP', '$95,000 - $105,000'],
      ['UPDATE', '$2'],
    ]);
  });

  it('merges by default when several councils are scraped', async () => {
    await writeFile(options.outputPath, JSON.stringify([makeJob({ reference_number: 'KEEP' })]), 'utf8');
    const scrapeLive = vi.fn<LiveScraper>().mockResolvedValue([makeJob({ reference_number: 'NEW' })]);

    const result = await runScrapePipeline(
      { ...options, tenancies: [testTenancy(), testTenancy({ name: 'Golden Plains Shire' })] },
      { logger: createMemoryLogger(), scrapeLive },
    );

    expect(result.jobs.map((job) => job.reference_number)).toEqual(['KEEP', 'NEW']);
  });

  it('overwrites the output for a single council', async () => {
    await writeFile(options.outputPath, JSON.stringify([makeJob({ reference_number: 'OLD' })]), 'utf8');
    const scrapeLive = vi.fn<LiveScraper>().mockResolvedValue([makeJob({ reference_number: 'NEW' })]);

    const result = await runScrapePipeline(options, { logger: createMemoryLogger(), scrapeLive });

    expect(result.jobs.map((job) => job.reference_number)).toEqual(['NEW']);
  });
});
