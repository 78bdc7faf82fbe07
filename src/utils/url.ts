import { URL } from 'node:url';
import { cleanText } from '../normalize/fields.js';
import { NOT_AVAILABLE } from '../types.js';

export function toAbsoluteUrl(value: string, base: string): string {
  try {
    return new URL(value, base).toString();
  } catch {
    return value;
  }
}

export interface ValidatedUrl {
  url: string;
  isValid: boolean;
}

/**
 * A detail URL is invalid when Pulse could not resolve the job's link id and
 * the href ended up carrying the literal "unknown".
 */
export function validateUrl(rawUrl: string | undefined): ValidatedUrl {
  const url = cleanText(rawUrl);
  if (url === NOT_AVAILABLE) {
    return { url, isValid: true };
  }
  return { url, isValid: !/unknown/i.test(url) };
}

export function lastPathSegment(url: string): string {
  const path = url.split(/[?#]/)[0] ?? '';
  return path.split('/').filter(Boolean).pop() ?? '';
}
