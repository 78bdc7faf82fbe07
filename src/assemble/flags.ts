import { NOT_AVAILABLE } from '../types.js';
import type { JobRecord, ParseFlag } from '../types.js';

export type FlaggableFields = Pick<
  JobRecord,
  'detail_url' | 'salary' | 'benefits' | 'attachments' | 'key_criteria' | 'band_level' | 'num_positions'
>;

/** Quality tags derived from a record's own fields; never stored independently. */
export function buildParseFlags(record: FlaggableFields): ParseFlag[] {
  const flags: ParseFlag[] = [];
  if (/unknown/i.test(record.detail_url)) {
    flags.push('invalid_url');
  }
  if (record.salary === NOT_AVAILABLE) {
    flags.push('missing_salary');
  }
  if (record.benefits === NOT_AVAILABLE) {
    flags.push('missing_benefits');
  }
  if (record.attachments.length === 0) {
    flags.push('no_attachments');
  }
  if (record.key_criteria.length === 0) {
    flags.push('missing_key_criteria');
  }
  if (record.band_level === NOT_AVAILABLE) {
    flags.push('scraping_error_band');
  }
  if (record.num_positions < 1) {
    flags.push('invalid_num_positions');
  }
  return flags;
}
