import { access } from 'node:fs/promises';
import { chromium } from 'playwright';
import { assembleJobRecord } from '../assemble/record.js';
import { PlaywrightListingDriver } from '../browser/playwrightListing.js';
import { playwrightDetailPageOpener } from '../browser/playwrightPage.js';
import type { OpenDetailPage } from '../browser/types.js';
import { describeError } from '../errors.js';
import { generateRss, selectRecentJobs, writeRss } from '../feed/rss.js';
import type { RssChannel } from '../feed/rss.js';
import { harvestListing } from '../harvest/listing.js';
import type { ListingDriver } from '../harvest/listing.js';
import { dedupeJobs, loadFixtureJobs, readExistingJobs, writeJobsJson } from '../storage/jobsStore.js';
import type { JobRecord, ScrapeSettings, Tenancy } from '../types.js';
import type { Logger } from '../utils/logger.js';
import { sleep } from '../utils/sleep.js';

export interface TenancyScrapeDeps {
  driver: ListingDriver;
  openDetailPage: OpenDetailPage;
  settings: ScrapeSettings;
  logger: Logger;
  wait?: (ms: number) => Promise<void>;
  now?: () => Date;
}

/** Harvests one council's listing and builds a record per candidate, one detail page at a time. */
export async function scrapeTenancy(tenancy: Tenancy, deps: TenancyScrapeDeps): Promise<JobRecord[]> {
  const wait = deps.wait ?? sleep;
  const harvest = await harvestListing(deps.driver, tenancy, deps.settings, { logger: deps.logger, wait });

  const jobs: JobRecord[] = [];
  for (const candidate of harvest.candidates) {
    const record = await assembleJobRecord(candidate, {
      tenancy,
      openDetailPage: deps.openDetailPage,
      logger: deps.logger,
      now: deps.now,
    });
    jobs.push(record);
    await wait(deps.settings.interJobDelayMs);
  }
  deps.logger.info(`Scraped ${jobs.length} jobs for ${tenancy.name} (source: ${harvest.source}).`);
  return jobs;
}

export type LiveScraper = (tenancies: Tenancy[], settings: ScrapeSettings, logger: Logger) => Promise<JobRecord[]>;

/**
 * Scrapes each council in turn with a single headless browser. A council
 * whose listing cannot be loaded is skipped; the run fails only when every
 * council failed.
 */
export const scrapeTenanciesLive: LiveScraper = async (tenancies, settings, logger) => {
  const browser = await chromium.launch({ headless: settings.headless });
  const failures: unknown[] = [];
  const jobs: JobRecord[] = [];
  try {
    const context = await browser.newContext({ userAgent: settings.userAgent });
    const openDetailPage = playwrightDetailPageOpener(context, {
      navigationTimeoutMs: settings.timeouts.detailNavigationMs,
      loadStateTimeoutMs: settings.timeouts.loadStateMs,
      clickTimeoutMs: settings.timeouts.clickMs,
      logger,
    });

    for (const [index, tenancy] of tenancies.entries()) {
      if (index > 0) {
        await sleep(settings.interCouncilDelayMs);
      }
      const page = await context.newPage();
      try {
        jobs.push(
          ...(await scrapeTenancy(tenancy, {
            driver: new PlaywrightListingDriver(page),
            openDetailPage,
            settings,
            logger,
          })),
        );
      } catch (error) {
        failures.push(error);
        logger.error(`Scrape failed for ${tenancy.name}: ${describeError(error)}`);
      } finally {
        await page.close();
      }
    }
  } finally {
    await browser.close();
  }

  if (tenancies.length > 0 && failures.length === tenancies.length) {
    throw failures[0];
  }
  return jobs;
};

export interface PipelineOptions {
  tenancies: Tenancy[];
  settings: ScrapeSettings;
  outputPath: string;
  rssPath: string;
  fixturePath?: string;
  fallbackFixturePath?: string;
  disableFallback?: boolean;
  merge?: boolean;
  channel?: RssChannel;
  now?: () => Date;
}

export interface PipelineDeps {
  logger: Logger;
  scrapeLive?: LiveScraper;
}

export type JobsSource = 'fixture' | 'live' | 'fallback';

export interface PipelineResult {
  source: JobsSource;
  jobs: JobRecord[];
  feedItemCount: number;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function collectJobs(
  options: PipelineOptions,
  deps: PipelineDeps,
): Promise<{ jobs: JobRecord[]; source: JobsSource }> {
  const { logger } = deps;
  const loadOptions = {
    defaultCouncil: options.tenancies[0]?.name ?? 'N/A',
    logger,
    now: options.now,
  };

  if (options.fixturePath) {
    return { jobs: await loadFixtureJobs(options.fixturePath, loadOptions), source: 'fixture' };
  }

  const scrapeLive = deps.scrapeLive ?? scrapeTenanciesLive;
  try {
    return { jobs: await scrapeLive(options.tenancies, options.settings, logger), source: 'live' };
  } catch (error) {
    logger.error(`Live scrape failed: ${describeError(error)}`);
    const fallbackPath = options.fallbackFixturePath;
    if (options.disableFallback || !fallbackPath || !(await fileExists(fallbackPath))) {
      throw error;
    }
    logger.warn(`Falling back to fixture at ${fallbackPath}`);
    return { jobs: await loadFixtureJobs(fallbackPath, loadOptions), source: 'fallback' };
  }
}

/**
 * Collects jobs (fixture, live scrape, or fallback fixture), writes the JSON
 * snapshot, and regenerates the RSS feed from it.
 */
export async function runScrapePipeline(options: PipelineOptions, deps: PipelineDeps): Promise<PipelineResult> {
  const { logger } = deps;
  const now = options.now ?? (() => new Date());
  const { jobs: collected, source } = await collectJobs(options, deps);

  const merge = options.merge ?? options.tenancies.length > 1;
  let jobs = collected;
  if (merge) {
    const existing = await readExistingJobs(options.outputPath, {
      defaultCouncil: options.tenancies[0]?.name ?? 'N/A',
      logger,
      now: options.now,
    });
    jobs = dedupeJobs([...existing, ...collected]);
    logger.info(`Merged ${collected.length} new jobs with ${existing.length} existing into ${jobs.length}.`);
  }

  await writeJobsJson(options.outputPath, jobs);
  logger.info(`${merge ? 'Rewrote' : 'Overwrote'} ${options.outputPath} with ${jobs.length} jobs (source: ${source}).`);

  const reference = now();
  const feedItemCount = selectRecentJobs(jobs, reference, options.settings.rssLookbackDays).length;
  const xml = generateRss(jobs, {
    now: reference,
    lookbackDays: options.settings.rssLookbackDays,
    channel: options.channel,
  });
  await writeRss(options.rssPath, xml);
  logger.info(`RSS generated with ${feedItemCount} of ${jobs.length} jobs.`);

  return { source, jobs, feedItemCount };
}
