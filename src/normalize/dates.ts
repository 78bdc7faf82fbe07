import { format, isValid, parse } from 'date-fns';

const ISO_DATE = /(\d{4}-\d{2}-\d{2})/;

const DAY_MONTH_YEAR =
  /\b(\d{1,2})(?:st|nd|rd|th)?(?:\s+of)?[\s/-]+([A-Za-z]{3,9})\.?,?[\s/-]+(\d{4}|\d{2})\b(?![:.]\d)/;
const MONTH_DAY_YEAR = /\b([A-Za-z]{3,9})\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})\b/;
const YEAR_MONTH_DAY = /\b(\d{4})[/.-](\d{1,2})[/.-](\d{1,2})\b/;
const NUMERIC_DATE = /\b(\d{1,2})[/.-](\d{1,2})[/.-](\d{4}|\d{2})\b/;
const MONTH_YEAR = /\b([A-Za-z]{3,9})\.?,?[\s/-]+(\d{4})\b/g;

// date-fns only knows three-letter abbreviations.
function normalizeMonth(month: string): string {
  return /^sept$/i.test(month) ? 'Sep' : month;
}

function tryFormats(value: string, formats: string[], referenceDate: Date): string | null {
  for (const pattern of formats) {
    const parsed = parse(value, pattern, referenceDate);
    if (isValid(parsed)) {
      return format(parsed, 'yyyy-MM-dd');
    }
  }
  return null;
}

function yearToken(year: string): string {
  return year.length === 2 ? 'yy' : 'yyyy';
}

export function findIsoDate(text: string): string | null {
  return text.match(ISO_DATE)?.[1] ?? null;
}

/**
 * Finds a calendar date written in prose ("Closing date: 5 September 2024",
 * "Applications close Monday, September 5th 2024", "5-Sep-24", "05/09/2024",
 * "2024/09/05") and returns it as `yyyy-MM-dd`. Numeric dates are read day
 * first. A bare month and year ("September 2024") is the first of the month.
 */
export function parseNaturalDate(text: string, referenceDate = new Date()): string | null {
  const dayFirst = text.match(DAY_MONTH_YEAR);
  if (dayFirst) {
    const [, day, month, year] = dayFirst;
    const yy = yearToken(year);
    const parsed = tryFormats(
      `${Number(day)} ${normalizeMonth(month)} ${year}`,
      [`d MMMM ${yy}`, `d MMM ${yy}`],
      referenceDate,
    );
    if (parsed) {
      return parsed;
    }
  }

  const monthFirst = text.match(MONTH_DAY_YEAR);
  if (monthFirst) {
    const [, month, day, year] = monthFirst;
    const parsed = tryFormats(`${normalizeMonth(month)} ${Number(day)} ${year}`, ['MMMM d yyyy', 'MMM d yyyy'], referenceDate);
    if (parsed) {
      return parsed;
    }
  }

  const yearFirst = text.match(YEAR_MONTH_DAY);
  if (yearFirst) {
    const [, year, month, day] = yearFirst;
    const parsed = tryFormats(`${year}/${Number(month)}/${Number(day)}`, ['yyyy/M/d'], referenceDate);
    if (parsed) {
      return parsed;
    }
  }

  const numeric = text.match(NUMERIC_DATE);
  if (numeric) {
    const [, day, month, year] = numeric;
    const parsed = tryFormats(`${Number(day)}/${Number(month)}/${year}`, [`d/M/${yearToken(year)}`], referenceDate);
    if (parsed) {
      return parsed;
    }
  }

  for (const [, month, year] of text.matchAll(MONTH_YEAR)) {
    const parsed = tryFormats(`1 ${normalizeMonth(month)} ${year}`, ['d MMMM yyyy', 'd MMM yyyy'], referenceDate);
    if (parsed) {
      return parsed;
    }
  }

  return null;
}
