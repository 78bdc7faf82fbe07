import {
  DEFAULT_CONFIG_PATH,
  DEFAULT_FALLBACK_FIXTURE_PATH,
  DEFAULT_OUTPUT_PATH,
  DEFAULT_RSS_PATH,
} from './config.js';

export interface CliArgs {
  fixture?: string;
  fixtureFallback: string;
  disableFallback: boolean;
  councils: string[];
  merge: boolean;
  output: string;
  rss: string;
  config: string;
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {
    fixtureFallback: DEFAULT_FALLBACK_FIXTURE_PATH,
    disableFallback: false,
    councils: [],
    merge: false,
    output: DEFAULT_OUTPUT_PATH,
    rss: DEFAULT_RSS_PATH,
    config: DEFAULT_CONFIG_PATH,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const takeValue = (): string => {
      const value = argv[i + 1];
      if (!value || value.startsWith('--')) {
        throw new Error(`Missing value for ${arg}`);
      }
      i += 1;
      return value;
    };
    switch (arg) {
      case '--fixture':
        args.fixture = takeValue();
        break;
      case '--fixture-fallback':
        args.fixtureFallback = takeValue();
        break;
      case '--disable-fallback':
        args.disableFallback = true;
        break;
      case '--council':
        args.councils.push(takeValue());
        break;
      case '--merge':
        args.merge = true;
        break;
      case '--output':
        args.output = takeValue();
        break;
      case '--rss':
        args.rss = takeValue();
        break;
      case '--config':
        args.config = takeValue();
        break;
      default:
        break;
    }
  }

  return args;
}
