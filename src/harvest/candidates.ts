import type { RawCandidate } from '../types.js';
import { normalizeWhitespace } from '../utils/text.js';
import { lastPathSegment } from '../utils/url.js';

/** One job from the listing app's in-memory store, paired with its rendered row link. */
export interface AppJobEntry {
  job: unknown;
  href: string;
}

/** Visible text of one rendered listing row. */
export interface RowSnapshot {
  title: string;
  href: string;
  text: string;
}

function readField(source: unknown, key: string): unknown {
  if (typeof source !== 'object' || source === null) {
    return undefined;
  }
  return Reflect.get(source, key);
}

function readString(source: unknown, key: string): string | undefined {
  const value = readField(source, key);
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return undefined;
}

export function candidateFromAppJob(entry: AppJobEntry): RawCandidate | null {
  const info = readField(entry.job, 'JobInfo');
  const title = readString(info, 'Title');
  if (!title) {
    return null;
  }
  const href = entry.href.trim();
  return {
    linkId: readString(entry.job, 'LinkId'),
    title,
    closingDate: readString(info, 'ClosingDate'),
    compensation: readString(info, 'Compensation'),
    location: readString(info, 'Location'),
    department: readString(info, 'Department'),
    employmentType: readString(info, 'EmploymentType'),
    workArrangement: readString(info, 'WorkArrangement'),
    jobRef: readString(info, 'JobRef'),
    detailHref: href || undefined,
    domHref: href || undefined,
    slug: href ? lastPathSegment(href) : undefined,
  };
}

function labelled(text: string, label: string): string | undefined {
  const match = text.match(new RegExp(`${label}:\\s*([^\\n\\r]+)`, 'i'));
  const value = match ? match[1].trim() : '';
  return value || undefined;
}

export function candidateFromRow(row: RowSnapshot): RawCandidate | null {
  const title = normalizeWhitespace(row.title);
  if (!title) {
    return null;
  }
  const href = row.href.trim();
  const linkId = href.match(/job\/([^/]+)\//i)?.[1] ?? 'unknown';
  return {
    title,
    linkId,
    closingDate: labelled(row.text, 'Closing date'),
    compensation: labelled(row.text, 'Compensation'),
    location: labelled(row.text, 'Location'),
    department: labelled(row.text, 'Department'),
    employmentType: labelled(row.text, 'Employment type'),
    workArrangement: labelled(row.text, 'Work arrangement'),
    jobRef: linkId,
    detailHref: href || undefined,
    domHref: href || undefined,
    slug: href ? lastPathSegment(href) : undefined,
  };
}
