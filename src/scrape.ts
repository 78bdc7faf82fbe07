#!/usr/bin/env node
import { parseArgs } from './cli.js';
import { loadScraperConfig, selectTenancies, settingsFromEnv } from './config.js';
import { describeError } from './errors.js';
import { runScrapePipeline } from './pipeline/scrape.js';
import { parseLogLevel, RunLogger } from './utils/logger.js';

function dateStamp(date = new Date()): string {
  return date.toISOString().slice(0, 10);
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const logger = new RunLogger(`logs/scrape_run_${dateStamp()}.log`, 'Scrape run', {
    minLevel: parseLogLevel(process.env.LOG_LEVEL),
  });
  await logger.init();

  try {
    const config = await loadScraperConfig(args.config);
    const tenancies = selectTenancies(config, args.councils);
    logger.info(`Councils: ${tenancies.map((tenancy) => tenancy.name).join(', ')}`);

    const result = await runScrapePipeline(
      {
        tenancies,
        settings: settingsFromEnv(),
        outputPath: args.output,
        rssPath: args.rss,
        fixturePath: args.fixture,
        fallbackFixturePath: args.fixtureFallback,
        disableFallback: args.disableFallback,
        merge: args.merge ? true : undefined,
      },
      { logger },
    );
    logger.info(`Run complete: ${result.jobs.length} jobs from ${result.source}, ${result.feedItemCount} in feed.`);
  } catch (error) {
    logger.error(`Scrape run failed: ${describeError(error)}`);
    throw error;
  } finally {
    await logger.close();
  }
}

main().catch((error) => {
  console.error(`Scrape run failed: ${String(error)}`);
  process.exitCode = 1;
});
