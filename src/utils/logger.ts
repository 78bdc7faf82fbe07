import { appendFile, mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_RANK: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface RunLoggerOptions {
  minLevel?: LogLevel;
  console?: boolean;
}

function isLogLevel(value: string): value is LogLevel {
  return value === 'DEBUG' || value === 'INFO' || value === 'WARN' || value === 'ERROR';
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'INFO'): LogLevel {
  const upper = (value ?? '').trim().toUpperCase();
  if (upper === 'WARNING') {
    return 'WARN';
  }
  return isLogLevel(upper) ? upper : fallback;
}

function nowIso(): string {
  return new Date().toISOString();
}

/**
 * Line-oriented run log written to a file and mirrored to the console.
 *
 * Logging calls return immediately; file writes are chained in order and
 * `close()` waits for all of them.
 */
export class RunLogger implements Logger {
  private pending: Promise<void> = Promise.resolve();
  private readonly minRank: number;
  private readonly mirrorToConsole: boolean;

  constructor(
    private readonly filePath: string,
    private readonly runLabel = 'Scrape run',
    options: RunLoggerOptions = {},
  ) {
    this.minRank = LEVEL_RANK[options.minLevel ?? 'INFO'];
    this.mirrorToConsole = options.console ?? true;
  }

  async init(): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, '', 'utf8');
    this.write(`=== ${this.runLabel} started ${nowIso()} ===`);
    await this.pending;
  }

  debug(message: string): void {
    this.log('DEBUG', message);
  }

  info(message: string): void {
    this.log('INFO', message);
  }

  warn(message: string): void {
    this.log('WARN', message);
  }

  error(message: string): void {
    this.log('ERROR', message);
  }

  async close(): Promise<void> {
    this.write(`=== ${this.runLabel} finished ${nowIso()} ===`);
    await this.pending;
  }

  private log(level: LogLevel, message: string): void {
    if (LEVEL_RANK[level] < this.minRank) {
      return;
    }
    const line = `[${level}] ${message}`;
    if (this.mirrorToConsole) {
      const stream = level === 'ERROR' || level === 'WARN' ? console.error : console.log;
      stream(`${nowIso()} ${line}`);
    }
    this.write(line);
  }

  private write(message: string): void {
    const line = `${nowIso()} ${message}\n`;
    this.pending = this.pending
      .then(() => appendFile(this.filePath, line, 'utf8'))
      .catch((error: unknown) => {
        console.error(`Could not write to ${this.filePath}: ${String(error)}`);
      });
  }
}
