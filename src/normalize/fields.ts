import { NOT_AVAILABLE } from '../types.js';
import type { SalaryType, WorkArrangement } from '../types.js';
import type { Logger } from '../utils/logger.js';
import { escapeRegExp, firstLine, titleCase } from '../utils/text.js';
import { findIsoDate, parseNaturalDate } from './dates.js';

const ERROR_TOKENS = ['most likely causes:', '404', 'error'];

// Checked in order; the more specific phrases come first so that
// "Permanent Part Time" reads as part time.
const EMPLOYMENT_TYPE_SYNONYMS: Array<[string, string]> = [
  ['part time', 'Part Time'],
  ['part-time', 'Part Time'],
  ['casual', 'Casual'],
  ['volunteer', 'Volunteer'],
  ['full time', 'Full Time'],
  ['full-time', 'Full Time'],
  ['fixed term', 'Full Time'],
  ['temporary', 'Full Time'],
  ['ongoing', 'Full Time'],
  ['permanent', 'Full Time'],
  ['perm', 'Full Time'],
];

const DEPARTMENT_ABBREVIATIONS: Array<[RegExp, string]> = [[/\benviro\b/gi, 'Environment']];

const JOB_CATEGORY_BY_DEPARTMENT: Array<[string, string]> = [
  ['economy and experience', 'Arts & Culture'],
  ['infrastructure', 'Infrastructure & Engineering'],
  ['community wellbeing', 'Community Services'],
  ['development', 'Planning & Development'],
];

const WORK_ARRANGEMENTS: Array<[string, WorkArrangement]> = [
  ['hybrid', 'Hybrid'],
  ['remote', 'Remote'],
  ['flexible', 'Flexible'],
  ['onsite', 'Onsite'],
];

const BAND_LEVEL = /^[1-8][A-Z]?$/;

/**
 * Trims a scraped value and returns `fallback` when it is missing, blank, or
 * looks like a server error page.
 */
export function cleanText(value: unknown, fallback = NOT_AVAILABLE): string {
  if (value === null || value === undefined) {
    return fallback;
  }
  const text = String(value).trim();
  if (!text) {
    return fallback;
  }
  const lowered = text.toLowerCase();
  if (ERROR_TOKENS.some((token) => lowered.includes(token))) {
    return fallback;
  }
  return text;
}

export function parseDateField(text: string | undefined, logger?: Logger): string {
  const cleaned = cleanText(text);
  if (cleaned === NOT_AVAILABLE) {
    return NOT_AVAILABLE;
  }
  const iso = findIsoDate(cleaned);
  if (iso) {
    return iso;
  }
  if (cleaned.toLowerCase().includes('ongoing')) {
    return NOT_AVAILABLE;
  }
  const parsed = parseNaturalDate(cleaned);
  if (parsed) {
    return parsed;
  }
  logger?.warn(`Failed to parse date: ${cleaned}`);
  return NOT_AVAILABLE;
}

export function parseClosingTime(text: string | undefined): string {
  const cleaned = cleanText(text);
  if (cleaned === NOT_AVAILABLE) {
    return NOT_AVAILABLE;
  }
  const match = cleaned.match(/(\d{1,2}:\d{2}\s*(?:AM|PM))/i);
  return match ? match[1].toUpperCase() : NOT_AVAILABLE;
}

export function cleanLocation(location: string | undefined): string {
  const cleaned = cleanText(location);
  if (cleaned === NOT_AVAILABLE) {
    return NOT_AVAILABLE;
  }
  const [beforeLabels] = firstLine(cleaned).split(/\b(?:Department|Compensation|Employment type)\b/i);
  return (beforeLabels ?? '').trim().replace(/[,;-]+$/, '').trim() || NOT_AVAILABLE;
}

export function normalizeEmploymentType(raw: string | undefined): string {
  const cleaned = cleanText(raw);
  if (cleaned === NOT_AVAILABLE) {
    return NOT_AVAILABLE;
  }
  const piece = firstLine(cleaned).trim();
  const lowered = piece.toLowerCase();
  for (const [synonym, canonical] of EMPLOYMENT_TYPE_SYNONYMS) {
    if (lowered.includes(synonym)) {
      return canonical;
    }
  }
  return titleCase(piece) || NOT_AVAILABLE;
}

export function extractWorkArrangement(...parts: Array<string | undefined>): WorkArrangement {
  const combined = parts
    .map((part) => cleanText(part, ''))
    .filter(Boolean)
    .join(' ')
    .toLowerCase();
  for (const [keyword, arrangement] of WORK_ARRANGEMENTS) {
    if (combined.includes(keyword)) {
      return arrangement;
    }
  }
  return NOT_AVAILABLE;
}

export interface SalaryFields {
  salary: string;
  salaryType: SalaryType;
}

function normalizeSalaryType(marker: string | undefined): SalaryType {
  switch (marker?.toLowerCase()) {
    case 'pa':
    case 'per annum':
      return 'per annum';
    case 'ph':
    case 'p/h':
    case 'per hour':
      return 'per hour';
    default:
      return NOT_AVAILABLE;
  }
}

export function parseSalaryFields(raw: string | undefined): SalaryFields {
  const cleaned = cleanText(raw);
  const missing: SalaryFields = { salary: NOT_AVAILABLE, salaryType: NOT_AVAILABLE };
  if (cleaned === NOT_AVAILABLE) {
    return missing;
  }
  const amount = cleaned.match(/\$?\d[\d,]*(?:\.\d+)?k?(?:\s*-\s*\$?\d[\d,]*(?:\.\d+)?k?)?/i);
  if (!amount) {
    return missing;
  }
  const marker = cleaned.match(/\b(pa|per annum|ph|p\/h|per hour)\b/i)?.[1];
  return {
    salary: amount[0].replace(/\s{2,}/g, ' '),
    salaryType: normalizeSalaryType(marker),
  };
}

export function cleanDepartment(raw: string | undefined): string {
  const cleaned = cleanText(raw);
  if (cleaned === NOT_AVAILABLE) {
    return NOT_AVAILABLE;
  }
  let department = firstLine(cleaned);
  for (const [pattern, replacement] of DEPARTMENT_ABBREVIATIONS) {
    department = department.replace(pattern, replacement);
  }
  return department.trim() || NOT_AVAILABLE;
}

export function inferJobCategory(department: string, bandLevel: string): string {
  if (department && department !== NOT_AVAILABLE) {
    const lowered = department.toLowerCase();
    const match = JOB_CATEGORY_BY_DEPARTMENT.find(([keyword]) => lowered.includes(keyword));
    if (match) {
      return match[1];
    }
  }
  if (bandLevel && BAND_LEVEL.test(bandLevel)) {
    const digit = Number(bandLevel[0]);
    if (digit <= 3) {
      return 'Entry Level';
    }
    if (digit <= 5) {
      return 'Mid Level';
    }
    return 'Senior Leadership';
  }
  return NOT_AVAILABLE;
}

export function extractBandLevel(text: string | undefined): string {
  const source = (text ?? '').trim();
  if (!source || source === NOT_AVAILABLE) {
    return NOT_AVAILABLE;
  }
  const labelled = source.match(/\b(?:band|level)\s*([1-8][A-Z]?)\b/i);
  const standalone = labelled ?? source.match(/\b([1-8][A-Z]?)\b/);
  return standalone ? normalizeBandLevel(standalone[1]) : NOT_AVAILABLE;
}

export function normalizeBandLevel(value: string | undefined): string {
  const upper = (value ?? '').trim().toUpperCase();
  return BAND_LEVEL.test(upper) ? upper : NOT_AVAILABLE;
}

export function extractContactInfo(text: string | undefined): string {
  const source = text ?? '';
  const emails = source.match(/[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g) ?? [];
  const phones = source.match(/\b\d{2,4}[-\s]?\d{3}[-\s]?\d{3,4}\b/g) ?? [];
  const contacts = [...new Set([...emails, ...phones])].sort();
  return contacts.length > 0 ? contacts.join(' | ') : NOT_AVAILABLE;
}

export function extractNumPositions(text: string | undefined): number {
  const match = (text ?? '').match(/(\d+)\s+position/i);
  if (!match) {
    return 1;
  }
  return Math.max(1, Number.parseInt(match[1], 10));
}

function keywordWindow(text: string | undefined, pattern: RegExp): string {
  const match = (text ?? '').match(pattern);
  return match ? cleanText(match[1]) : NOT_AVAILABLE;
}

export function extractApplicationInstructions(text: string | undefined): string {
  return keywordWindow(text, /(apply[\s\S]{0,120})/i);
}

export function extractEeo(text: string | undefined): string {
  const statement = keywordWindow(text, /(equal opportunity[\s\S]{0,120})/i);
  return statement !== NOT_AVAILABLE ? statement : keywordWindow(text, /(diverse[\s\S]{0,120})/i);
}

export function extractPostedDate(text: string | undefined, logger?: Logger): string {
  const labelled = (text ?? '').match(/\b(?:date posted|posted(?: on)?|advertised(?: on)?|published(?: on)?)\s*[:-]?\s*([^\n\r]+)/i);
  if (labelled) {
    const parsed = parseDateField(labelled[1], logger);
    if (parsed !== NOT_AVAILABLE) {
      return parsed;
    }
  }
  return findIsoDate(text ?? '') ?? NOT_AVAILABLE;
}

export function extractBenefitsFromText(text: string | undefined): string {
  return keywordWindow(text, /(\d{1,2}(?:\.\d)?%\s*super[^\n\r]*)/i);
}

/**
 * Reads the value that follows the first label found, e.g.
 * `Salary: $90,000 pa` or `Applications close 12 May 2025`.
 */
export function extractLabelValue(text: string | undefined, labels: string[]): string {
  const source = (text ?? '').trim();
  if (!source) {
    return NOT_AVAILABLE;
  }
  for (const label of labels) {
    const pattern = new RegExp(`${escapeRegExp(label)}\\s*(?:[:\\-]\\s*|\\s+)([^\\n\\r]+)`, 'i');
    const match = source.match(pattern);
    if (match) {
      return cleanText(match[1]);
    }
  }
  return NOT_AVAILABLE;
}
