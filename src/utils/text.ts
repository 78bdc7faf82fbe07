export function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

export function firstLine(value: string): string {
  return value.split(/\r?\n/)[0] ?? '';
}

/** Joins the non-blank lines of a block of page text with single spaces. */
export function joinLines(value: string): string {
  return value
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean)
    .join(' ');
}

export function titleCase(value: string): string {
  return value.replace(/[A-Za-z]+/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

/** Human-readable slug used in Pulse detail-page URLs. */
export function slugTitle(title: string): string {
  return title
    .replace(/[^a-zA-Z0-9\s-]/g, '')
    .toLowerCase()
    .trim()
    .replace(/\s/g, '-')
    .replace(/-{2,}/g, '-');
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function looksLikePdf(url: string): boolean {
  return /\.pdf($|[?#])/i.test(url);
}

export function uniqueInOrder(values: string[]): string[] {
  return [...new Set(values)];
}
