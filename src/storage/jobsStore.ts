import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { finalizeRecord } from '../assemble/record.js';
import { FixtureError } from '../errors.js';
import { cleanText, extractWorkArrangement, normalizeBandLevel } from '../normalize/fields.js';
import { NOT_AVAILABLE } from '../types.js';
import type { JobRecord, SalaryType } from '../types.js';
import type { Logger } from '../utils/logger.js';

// Each field degrades to its default on its own; only a non-object entry is skipped.
const scalar = z.union([z.string(), z.number(), z.boolean()]).nullish().catch(null);

const text = scalar.transform((value) => cleanText(value));

const optionalText = scalar.transform((value) => (value === null || value === undefined ? undefined : String(value)));

const stringList = z
  .array(z.union([z.string(), z.number()]))
  .nullish()
  .catch(null)
  .transform((value) => (value ?? []).map(String));

const salaryType = scalar.transform((value): SalaryType =>
  value === 'per annum' || value === 'per hour' ? value : NOT_AVAILABLE,
);

const numPositions = scalar.transform((value) => {
  const parsed = typeof value === 'number' ? value : Number.parseInt(String(value ?? ''), 10);
  return Number.isInteger(parsed) && parsed >= 1 ? parsed : 1;
});

const storedJobSchema = z.object({
  title: text,
  council: optionalText,
  detail_url: text,
  closing_date: text,
  closing_time: text,
  location: text,
  employment_type: text,
  work_arrangement: optionalText.transform((value) => extractWorkArrangement(value)),
  salary: text,
  salary_type: salaryType,
  band_level: optionalText.transform((value) => normalizeBandLevel(value)),
  description: text,
  requirements: stringList,
  key_criteria: stringList,
  application_instructions: text,
  contact_info: text,
  reference_number: text,
  department: text,
  job_category: text,
  benefits: text,
  attachments: stringList,
  num_positions: numPositions,
  eeo_statement: text,
  posted_date: text,
  scraped_at: optionalText,
});

const payloadSchema = z.union([
  z.array(z.unknown()),
  z.object({ jobs: z.array(z.unknown()).default([]) }).passthrough(),
]);

export interface LoadJobsOptions {
  defaultCouncil: string;
  logger: Logger;
  now?: () => Date;
}

/**
 * Normalizes stored job objects into records: council and `scraped_at` are
 * filled when absent and `parse_flags` is always recomputed.
 */
export function parseStoredJobs(payload: unknown, options: LoadJobsOptions): JobRecord[] {
  const now = options.now ?? (() => new Date());
  const parsed = payloadSchema.parse(payload);
  const entries = Array.isArray(parsed) ? parsed : parsed.jobs;
  const jobs: JobRecord[] = [];
  entries.forEach((entry, index) => {
    const result = storedJobSchema.safeParse(entry);
    if (!result.success) {
      options.logger.warn(`Skipping stored job #${index + 1}: ${result.error.issues[0]?.message ?? 'invalid record'}`);
      return;
    }
    const { council, scraped_at: scrapedAt, ...fields } = result.data;
    jobs.push(
      finalizeRecord({
        ...fields,
        council: cleanText(council, options.defaultCouncil),
        scraped_at: scrapedAt?.trim() || now().toISOString(),
      }),
    );
  });
  return jobs;
}

async function readJson(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new FixtureError(`Fixture not found: ${filePath}`, filePath, { cause: error });
  }
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new FixtureError(`Fixture is not valid JSON: ${filePath}`, filePath, { cause: error });
  }
}

/** Loads a captured job list (a bare array or `{ "jobs": [...] }`). */
export async function loadFixtureJobs(filePath: string, options: LoadJobsOptions): Promise<JobRecord[]> {
  const payload = await readJson(filePath);
  let jobs: JobRecord[];
  try {
    jobs = parseStoredJobs(payload, options);
  } catch (error) {
    throw new FixtureError(`Fixture has an unexpected shape: ${filePath}`, filePath, { cause: error });
  }
  options.logger.warn(`Loaded ${jobs.length} jobs from fixture ${filePath}`);
  return jobs;
}

/** Previously published jobs, or none when the file does not exist yet. */
export async function readExistingJobs(filePath: string, options: LoadJobsOptions): Promise<JobRecord[]> {
  try {
    return await loadFixtureJobs(filePath, options);
  } catch (error) {
    options.logger.warn(`Starting without existing jobs from ${filePath}: ${String(error)}`);
    return [];
  }
}

export function dedupeKey(job: JobRecord): string {
  if (job.reference_number !== NOT_AVAILABLE) {
    return job.reference_number;
  }
  return `${job.title}|${job.council}|${job.detail_url}`;
}

function scrapedTime(job: JobRecord): number {
  const parsed = Date.parse(job.scraped_at);
  return Number.isNaN(parsed) ? 0 : parsed;
}

/** Keeps the most recently scraped record per key, in first-seen key order. */
export function dedupeJobs(jobs: JobRecord[]): JobRecord[] {
  const byKey = new Map<string, JobRecord>();
  for (const job of jobs) {
    const key = dedupeKey(job);
    const existing = byKey.get(key);
    if (!existing || scrapedTime(job) >= scrapedTime(existing)) {
      byKey.set(key, job);
    }
  }
  return [...byKey.values()];
}

export async function writeJobsJson(filePath: string, jobs: JobRecord[]): Promise<void> {
  const dir = dirname(filePath);
  if (dir && dir !== '.') {
    await mkdir(dir, { recursive: true });
  }
  await writeFile(filePath, `${JSON.stringify(jobs, null, 2)}\n`, 'utf8');
}
