import { ScrapeError } from '../errors.js';
import type { RawCandidate, ScrapeSettings, Tenancy, TenancySelectors } from '../types.js';
import type { Logger } from '../utils/logger.js';
import { sleep } from '../utils/sleep.js';
import { candidateFromAppJob, candidateFromRow } from './candidates.js';
import type { AppJobEntry, RowSnapshot } from './candidates.js';

export type HarvestState =
  | 'NAV'
  | 'TRIGGER_LOAD'
  | 'WAIT_FOR_ROWS'
  | 'SCROLL_LOOP'
  | 'EXTRACT_STRUCTURED'
  | 'EXTRACT_DOM_FALLBACK'
  | 'DONE';

/** Browser operations the listing harvester drives, one listing page at a time. */
export interface ListingDriver {
  goto(url: string, timeoutMs: number): Promise<void>;
  waitForDomContent(timeoutMs: number): Promise<void>;
  title(): Promise<string>;
  /** Calls the listing app's global load hook; false when the page has none. */
  triggerLoad(hookName: string): Promise<boolean>;
  waitForRows(rowSelector: string, minRows: number, timeoutMs: number): Promise<void>;
  screenshot(filePath: string): Promise<void>;
  scrollToBottom(): Promise<void>;
  readAppJobs(selectors: TenancySelectors): Promise<AppJobEntry[]>;
  readRows(selectors: TenancySelectors): Promise<RowSnapshot[]>;
}

export type HarvestSource = 'structured' | 'dom' | 'none';

export interface HarvestResult {
  candidates: RawCandidate[];
  source: HarvestSource;
  states: HarvestState[];
}

export interface HarvestOptions {
  logger: Logger;
  wait?: (ms: number) => Promise<void>;
}

function compact(candidates: Array<RawCandidate | null>): RawCandidate[] {
  return candidates.filter((candidate): candidate is RawCandidate => candidate !== null);
}

/**
 * Loads a Pulse listing page and returns its raw job candidates.
 *
 * Only a failed navigation is fatal. Every later step degrades to whatever
 * the page has rendered so far.
 */
export async function harvestListing(
  driver: ListingDriver,
  tenancy: Tenancy,
  settings: ScrapeSettings,
  options: HarvestOptions,
): Promise<HarvestResult> {
  const { logger } = options;
  const wait = options.wait ?? sleep;
  const states: HarvestState[] = [];
  const enter = (state: HarvestState): void => {
    states.push(state);
    logger.info(`[${tenancy.name}] listing state ${state}`);
  };

  enter('NAV');
  logger.info(`Starting scrape for ${tenancy.name} at ${tenancy.listingUrl}`);
  try {
    await driver.goto(tenancy.listingUrl, settings.timeouts.listingNavigationMs);
  } catch (error) {
    throw new ScrapeError(`Could not load listing ${tenancy.listingUrl}`, tenancy.name, { cause: error });
  }
  try {
    await driver.waitForDomContent(settings.timeouts.loadStateMs);
    logger.info(`Page title: ${await driver.title()}`);
  } catch (error) {
    logger.warn(`Listing did not reach domcontentloaded: ${String(error)}`);
  }

  enter('TRIGGER_LOAD');
  try {
    if (await driver.triggerLoad(tenancy.loadHook)) {
      logger.info(`Triggered ${tenancy.loadHook}().`);
    } else {
      logger.warn(`No ${tenancy.loadHook}() function found.`);
    }
  } catch (error) {
    logger.warn(`Calling ${tenancy.loadHook}() failed: ${String(error)}`);
  }

  enter('WAIT_FOR_ROWS');
  try {
    await driver.waitForRows(tenancy.selectors.row, tenancy.minCardRows, settings.timeouts.rowsMs);
    logger.info(`${tenancy.minCardRows}+ job rows loaded.`);
  } catch {
    logger.warn(
      `Fewer than ${tenancy.minCardRows} job rows after ${Math.round(settings.timeouts.rowsMs / 1000)}s; continuing with available.`,
    );
  }

  if (settings.listingScreenshotPath) {
    try {
      await driver.screenshot(settings.listingScreenshotPath);
      logger.info(`Screenshot saved: ${settings.listingScreenshotPath}`);
    } catch (error) {
      logger.warn(`Listing screenshot failed: ${String(error)}`);
    }
  }

  enter('SCROLL_LOOP');
  for (let i = 0; i < settings.scrollIterations; i += 1) {
    try {
      await driver.scrollToBottom();
    } catch (error) {
      logger.warn(`Scroll ${i + 1} failed: ${String(error)}`);
    }
    await wait(settings.scrollDelayMs);
    logger.debug(`Scroll ${i + 1}/${settings.scrollIterations} complete.`);
  }

  enter('EXTRACT_STRUCTURED');
  let candidates: RawCandidate[] = [];
  let source: HarvestSource = 'none';
  try {
    const entries = await driver.readAppJobs(tenancy.selectors);
    candidates = compact(entries.map((entry) => candidateFromAppJob(entry)));
    logger.info(`Accessed app data: ${candidates.length} jobs.`);
  } catch (error) {
    logger.error(`Error accessing app data: ${String(error)}`);
  }
  if (candidates.length > 0) {
    source = 'structured';
  } else {
    enter('EXTRACT_DOM_FALLBACK');
    try {
      const rows = await driver.readRows(tenancy.selectors);
      candidates = compact(rows.map((row) => candidateFromRow(row)));
      logger.info(`Fallback DOM scrape: ${candidates.length} jobs.`);
      if (candidates.length > 0) {
        source = 'dom';
      }
    } catch (error) {
      logger.error(`Fallback DOM error: ${String(error)}`);
    }
  }

  enter('DONE');
  return {
    candidates: candidates.slice(0, settings.maxJobs),
    source,
    states,
  };
}
