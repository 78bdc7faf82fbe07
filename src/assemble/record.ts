import type { DetailPage, OpenDetailPage } from '../browser/types.js';
import { emptyDetailFields, extractDetailFields, MAX_DESCRIPTION_LENGTH } from '../extract/detail.js';
import type { DetailFields } from '../extract/detail.js';
import {
  cleanDepartment,
  cleanLocation,
  cleanText,
  extractLabelValue,
  extractWorkArrangement,
  inferJobCategory,
  normalizeBandLevel,
  normalizeEmploymentType,
  parseClosingTime,
  parseDateField,
  parseSalaryFields,
} from '../normalize/fields.js';
import { NOT_AVAILABLE } from '../types.js';
import type { JobRecord, RawCandidate, Tenancy } from '../types.js';
import type { Logger } from '../utils/logger.js';
import { joinLines, slugTitle } from '../utils/text.js';
import { toAbsoluteUrl, validateUrl } from '../utils/url.js';
import { buildParseFlags } from './flags.js';

export const SALARY_LABELS = ['salary', 'remuneration', 'classification', 'band', 'pay rate'];
export const CLOSING_DATE_LABELS = ['closing date', 'applications close', 'applications closing', 'closes'];

export interface AssembleContext {
  tenancy: Tenancy;
  openDetailPage: OpenDetailPage;
  logger: Logger;
  now?: () => Date;
}

function absoluteHref(value: string | undefined, listingUrl: string): string {
  const cleaned = cleanText(value, '');
  if (!cleaned || cleaned === NOT_AVAILABLE) {
    return '';
  }
  return toAbsoluteUrl(cleaned, `${listingUrl.replace(/\/+$/, '')}/`);
}

/**
 * Picks the detail-page URL for a candidate: its own href, then a URL built
 * from the Pulse link id and a title slug, then the href read off the row.
 */
export function resolveDetailUrl(candidate: RawCandidate, listingUrl: string, fallbackSlug: string): string {
  const explicit = absoluteHref(candidate.detailHref, listingUrl);
  if (explicit) {
    return explicit;
  }

  const linkId = cleanText(candidate.linkId, '');
  if (linkId && linkId !== NOT_AVAILABLE && linkId.toLowerCase() !== 'unknown') {
    const slug = slugTitle(candidate.slug || candidate.title || fallbackSlug) || fallbackSlug;
    return `${listingUrl.replace(/\/+$/, '')}/job/${linkId}/${slug}?source=public`;
  }

  return absoluteHref(candidate.domHref, listingUrl) || NOT_AVAILABLE;
}

function cleanList(values: string[]): string[] {
  return values.map((value) => cleanText(value)).filter((value) => value !== NOT_AVAILABLE);
}

/**
 * Applies the text invariants (trimmed, error-token free, "N/A" when empty)
 * and derives `parse_flags`.
 */
export function finalizeRecord(fields: Omit<JobRecord, 'parse_flags'>): JobRecord {
  const record: Omit<JobRecord, 'parse_flags'> = {
    ...fields,
    title: cleanText(fields.title),
    council: cleanText(fields.council),
    detail_url: cleanText(fields.detail_url),
    closing_date: cleanText(fields.closing_date),
    closing_time: cleanText(fields.closing_time),
    location: cleanText(fields.location),
    employment_type: cleanText(fields.employment_type),
    salary: cleanText(fields.salary),
    band_level: normalizeBandLevel(fields.band_level),
    description: cleanText(fields.description).slice(0, MAX_DESCRIPTION_LENGTH),
    requirements: cleanList(fields.requirements),
    key_criteria: cleanList(fields.key_criteria),
    application_instructions: cleanText(fields.application_instructions),
    contact_info: cleanText(fields.contact_info),
    reference_number: cleanText(fields.reference_number),
    department: cleanText(fields.department),
    job_category: cleanText(fields.job_category),
    benefits: cleanText(fields.benefits),
    num_positions: Number.isInteger(fields.num_positions) ? fields.num_positions : 1,
    eeo_statement: cleanText(fields.eeo_statement),
    posted_date: cleanText(fields.posted_date),
  };
  return { ...record, parse_flags: buildParseFlags(record) };
}

async function visitDetailPage(url: string, context: AssembleContext): Promise<DetailFields> {
  const { logger, openDetailPage, tenancy } = context;
  let page: DetailPage | undefined;
  try {
    page = await openDetailPage(url);
    return await extractDetailFields(page, tenancy.selectors, logger);
  } catch (error) {
    logger.error(`Detail page error for ${url}: ${String(error)}`);
    return emptyDetailFields();
  } finally {
    if (page) {
      try {
        await page.close();
      } catch (error) {
        logger.debug(`Closing detail page ${url} failed: ${String(error)}`);
      }
    }
  }
}

/** Builds one canonical record from a listing candidate, visiting its detail page when the URL allows. */
export async function assembleJobRecord(candidate: RawCandidate, context: AssembleContext): Promise<JobRecord> {
  const { logger, tenancy } = context;
  const now = context.now ?? (() => new Date());

  const title = cleanText(candidate.title);
  const linkId = candidate.linkId || 'unknown';
  const rawReference = cleanText(candidate.jobRef ?? linkId);
  const referenceNumber = rawReference.toLowerCase() === 'unknown' ? NOT_AVAILABLE : rawReference;
  const fallbackSlug = slugTitle(title !== NOT_AVAILABLE ? title : 'role');
  const resolvedUrl = resolveDetailUrl(candidate, tenancy.listingUrl, fallbackSlug);
  const { url: detailUrl, isValid } = validateUrl(resolvedUrl);

  const closingText = candidate.closingDate ?? NOT_AVAILABLE;
  let closingDate = parseDateField(closingText, logger);
  let closingTime = parseClosingTime(closingText);
  let { salary, salaryType } = parseSalaryFields(candidate.compensation);
  const location = cleanLocation(candidate.location);
  const employmentType = normalizeEmploymentType(candidate.employmentType);
  const workArrangement = extractWorkArrangement(candidate.employmentType, candidate.workArrangement);
  const department = cleanDepartment(candidate.department);

  let detail = emptyDetailFields();
  if (detailUrl === NOT_AVAILABLE || !isValid) {
    logger.warn(`Skipping detail page for "${title}": URL missing or invalid (${detailUrl})`);
  } else {
    detail = await visitDetailPage(detailUrl, context);
  }

  const bodyText = detail.bodyText;
  if (salary === NOT_AVAILABLE && bodyText) {
    const backfilled = parseSalaryFields(extractLabelValue(bodyText, SALARY_LABELS));
    if (backfilled.salary !== NOT_AVAILABLE) {
      salary = backfilled.salary;
      salaryType = backfilled.salaryType;
    }
  }
  if (closingDate === NOT_AVAILABLE && bodyText) {
    const closingRaw = extractLabelValue(bodyText, CLOSING_DATE_LABELS);
    if (closingRaw !== NOT_AVAILABLE) {
      closingDate = parseDateField(closingRaw, logger);
      const backfilledTime = parseClosingTime(closingRaw);
      if (backfilledTime !== NOT_AVAILABLE) {
        closingTime = backfilledTime;
      }
    }
  }
  let description = detail.description;
  if (description === NOT_AVAILABLE && bodyText) {
    description = joinLines(bodyText).slice(0, MAX_DESCRIPTION_LENGTH) || NOT_AVAILABLE;
  }

  const bandLevel = normalizeBandLevel(detail.bandLevel);

  const record = finalizeRecord({
    title,
    council: cleanText(tenancy.name),
    detail_url: detailUrl,
    closing_date: closingDate,
    closing_time: closingTime,
    location,
    employment_type: employmentType,
    work_arrangement: workArrangement,
    salary,
    salary_type: salaryType,
    band_level: bandLevel,
    description,
    requirements: detail.requirements,
    key_criteria: detail.keyCriteria,
    application_instructions: detail.applicationInstructions,
    contact_info: detail.contactInfo,
    reference_number: referenceNumber,
    department,
    job_category: inferJobCategory(department, bandLevel),
    benefits: detail.benefits,
    attachments: detail.attachments,
    num_positions: detail.numPositions,
    eeo_statement: detail.eeoStatement,
    posted_date: detail.postedDate,
    scraped_at: now().toISOString(),
  });
  logger.info(`Added job: ${record.title} for ${record.council} (Ref: ${record.reference_number})`);
  return record;
}
