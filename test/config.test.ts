import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import { loadScraperConfig, parseScraperConfig, selectTenancies, settingsFromEnv } from '../src/config.js';

const defaults = {
  selectors: {
    appRoot: '#jobs-app',
    row: '.card-row',
    rowTitle: '.job-title',
    detailLink: 'a.job-link',
    description: ['.job-description'],
    headings: 'h2,h3',
    attachments: "a[href*='.pdf']",
  },
};

describe('parseScraperConfig', () => {
  it('merges tenancy overrides over the defaults', () => {
    const config = parseScraperConfig({
      defaults,
      tenancies: [
        { name: 'City of Ballarat', listingUrl: 'https://ballarat.pulsesoftware.com/Pulse/jobs/' },
        {
          name: 'Golden Plains Shire',
          listingUrl: 'https://goldenplains.pulsesoftware.com/Pulse/jobs',
          minCardRows: 5,
          loadHook: 'loadJobs',
          selectors: { row: '.job-row' },
        },
      ],
    });

    expect(config.active).toEqual(['City of Ballarat', 'Golden Plains Shire']);
    expect(config.tenancies[0]).toMatchObject({
      listingUrl: 'https://ballarat.pulsesoftware.com/Pulse/jobs',
      minCardRows: 15,
      loadHook: 'load',
      selectors: defaults.selectors,
    });
    expect(config.tenancies[1]).toMatchObject({
      minCardRows: 5,
      loadHook: 'loadJobs',
      selectors: { ...defaults.selectors, row: '.job-row' },
    });
  });

  it('rejects a tenancy without a valid listing URL', () => {
    expect(() => parseScraperConfig({ defaults, tenancies: [{ name: 'Nowhere', listingUrl: 'not a url' }] })).toThrow(
      ZodError,
    );
  });

  it('loads the shipped configuration', async () => {
    const config = await loadScraperConfig();
    expect(selectTenancies(config).map((tenancy) => tenancy.listingUrl)).toEqual([
      'https://ballarat.pulsesoftware.com/Pulse/jobs',
    ]);
  });
});

describe('selectTenancies', () => {
  const config = parseScraperConfig({
    active: ['City of Ballarat'],
    defaults,
    tenancies: [
      { name: 'City of Ballarat', listingUrl: 'https://ballarat.pulsesoftware.com/Pulse/jobs' },
      { name: 'Golden Plains Shire', listingUrl: 'https://goldenplains.pulsesoftware.com/Pulse/jobs' },
    ],
  });

  it('defaults to the active councils', () => {
    expect(selectTenancies(config).map((tenancy) => tenancy.name)).toEqual(['City of Ballarat']);
  });

  it('matches requested names case-insensitively', () => {
    expect(selectTenancies(config, ['golden plains shire', 'CITY OF BALLARAT']).map((tenancy) => tenancy.name)).toEqual([
      'Golden Plains Shire',
      'City of Ballarat',
    ]);
  });

  it('rejects unknown councils', () => {
    expect(() => selectTenancies(config, ['Atlantis'])).toThrow(
      'Unknown council "Atlantis". Known: City of Ballarat, Golden Plains Shire',
    );
  });
});

describe('settingsFromEnv', () => {
  it('uses the defaults for an empty environment', () => {
    const settings = settingsFromEnv({});
    expect(settings).toMatchObject({
      maxJobs: 20,
      scrollIterations: 20,
      scrollDelayMs: 1000,
      interJobDelayMs: 1000,
      interCouncilDelayMs: 5000,
      rssLookbackDays: 30,
      headless: true,
    });
    expect(settings.listingScreenshotPath).toBeUndefined();
  });

  it('reads overrides and ignores invalid numbers', () => {
    const settings = settingsFromEnv({
      MAX_JOBS: '5',
      SCROLL_DELAY_SECONDS: '0.5',
      RSS_LOOKBACK_DAYS: 'soon',
      HEADLESS: 'false',
      LISTING_SCREENSHOT: 'logs/listing.png',
      SCRAPER_USER_AGENT: 'test-agent',
    });
    expect(settings).toMatchObject({
      maxJobs: 5,
      scrollDelayMs: 500,
      rssLookbackDays: 30,
      headless: false,
      listingScreenshotPath: 'logs/listing.png',
      userAgent: 'test-agent',
    });
  });
});
