import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { ScrapeSettings, Tenancy, TenancySelectors } from './types.js';

export const DEFAULT_CONFIG_PATH = 'data/tenancies.json';
export const DEFAULT_FALLBACK_FIXTURE_PATH = 'docs/pulse_fixture.json';
export const DEFAULT_OUTPUT_PATH = 'jobs_output.json';
export const DEFAULT_RSS_PATH = 'rss.xml';

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const selector = z.string().trim().min(1);

const selectorsSchema = z.object({
  appRoot: selector,
  row: selector,
  rowTitle: selector,
  detailLink: selector,
  description: z.array(selector).min(1),
  headings: selector,
  attachments: selector,
});

const tenancySchema = z.object({
  name: z.string().trim().min(1),
  listingUrl: z.string().url(),
  minCardRows: z.number().int().positive().optional(),
  loadHook: z.string().trim().min(1).optional(),
  selectors: selectorsSchema.partial().optional(),
});

const configFileSchema = z.object({
  active: z.array(z.string().trim().min(1)).optional(),
  defaults: z.object({
    minCardRows: z.number().int().positive().default(15),
    loadHook: z.string().trim().min(1).default('load'),
    selectors: selectorsSchema,
  }),
  tenancies: z.array(tenancySchema).min(1),
});

export interface ScraperConfig {
  tenancies: Tenancy[];
  active: string[];
}

function mergeSelectors(base: TenancySelectors, overrides: Partial<TenancySelectors> | undefined): TenancySelectors {
  return {
    appRoot: overrides?.appRoot ?? base.appRoot,
    row: overrides?.row ?? base.row,
    rowTitle: overrides?.rowTitle ?? base.rowTitle,
    detailLink: overrides?.detailLink ?? base.detailLink,
    description: overrides?.description ?? base.description,
    headings: overrides?.headings ?? base.headings,
    attachments: overrides?.attachments ?? base.attachments,
  };
}

export function parseScraperConfig(raw: unknown): ScraperConfig {
  const parsed = configFileSchema.parse(raw);
  const tenancies = parsed.tenancies.map(
    (tenancy): Tenancy => ({
      name: tenancy.name,
      listingUrl: tenancy.listingUrl.replace(/\/+$/, ''),
      minCardRows: tenancy.minCardRows ?? parsed.defaults.minCardRows,
      loadHook: tenancy.loadHook ?? parsed.defaults.loadHook,
      selectors: mergeSelectors(parsed.defaults.selectors, tenancy.selectors),
    }),
  );
  return {
    tenancies,
    active: parsed.active ?? tenancies.map((tenancy) => tenancy.name),
  };
}

export async function loadScraperConfig(filePath = DEFAULT_CONFIG_PATH): Promise<ScraperConfig> {
  const content = await readFile(filePath, 'utf8');
  return parseScraperConfig(JSON.parse(content));
}

/** Tenancies named on the command line, or the configured active set. */
export function selectTenancies(config: ScraperConfig, names: string[] = []): Tenancy[] {
  const wanted = names.length > 0 ? names : config.active;
  return wanted.map((name) => {
    const tenancy = config.tenancies.find((candidate) => candidate.name.toLowerCase() === name.toLowerCase());
    if (!tenancy) {
      throw new Error(`Unknown council "${name}". Known: ${config.tenancies.map((item) => item.name).join(', ')}`);
    }
    return tenancy;
  });
}

function numberFromEnv(value: string | undefined, fallback: number, min = 0): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed >= min ? parsed : fallback;
}

function booleanFromEnv(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  return !/^(0|false|no|off)$/i.test(value.trim());
}

export function settingsFromEnv(env: NodeJS.ProcessEnv = process.env): ScrapeSettings {
  const seconds = (value: string | undefined, fallback: number): number =>
    Math.round(numberFromEnv(value, fallback) * 1000);
  return {
    maxJobs: Math.floor(numberFromEnv(env.MAX_JOBS, 20, 1)),
    scrollIterations: Math.floor(numberFromEnv(env.SCROLL_ITERATIONS, 20)),
    scrollDelayMs: seconds(env.SCROLL_DELAY_SECONDS, 1),
    interJobDelayMs: seconds(env.INTER_JOB_DELAY_SECONDS, 1),
    interCouncilDelayMs: seconds(env.INTER_COUNCIL_DELAY_SECONDS, 5),
    rssLookbackDays: numberFromEnv(env.RSS_LOOKBACK_DAYS, 30, 1),
    headless: booleanFromEnv(env.HEADLESS, true),
    listingScreenshotPath: env.LISTING_SCREENSHOT?.trim() || undefined,
    userAgent: env.SCRAPER_USER_AGENT?.trim() || DEFAULT_USER_AGENT,
    timeouts: {
      listingNavigationMs: 90000,
      loadStateMs: 30000,
      rowsMs: 60000,
      detailNavigationMs: 60000,
      clickMs: 2000,
    },
  };
}
