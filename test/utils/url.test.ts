import { describe, expect, it } from 'vitest';
import { lastPathSegment, toAbsoluteUrl, validateUrl } from '../../src/utils/url.js';

describe('validateUrl', () => {
  it('accepts a resolved detail URL', () => {
    const url = 'https://ballarat.pulsesoftware.com/Pulse/jobs/job/ABC123/senior-planner?source=public';
    expect(validateUrl(url)).toEqual({ url, isValid: true });
  });

  it('rejects URLs carrying an unresolved link id', () => {
    expect(validateUrl(' https://ballarat.pulsesoftware.com/Pulse/jobs/job/Unknown/role ')).toEqual({
      url: 'https://ballarat.pulsesoftware.com/Pulse/jobs/job/Unknown/role',
      isValid: false,
    });
  });

  it('passes a missing URL through as N/A', () => {
    expect(validateUrl(undefined)).toEqual({ url: 'N/A', isValid: true });
  });
});

describe('url helpers', () => {
  it('resolves relative links against the page', () => {
    expect(toAbsoluteUrl('/docs/pd.pdf', 'https://council.example/Pulse/jobs/job/1/x')).toBe(
      'https://council.example/docs/pd.pdf',
    );
  });

  it('returns the value unchanged when it cannot be resolved', () => {
    expect(toAbsoluteUrl('docs/pd.pdf', 'not a url')).toBe('docs/pd.pdf');
  });

  it('reads the last path segment without the query', () => {
    expect(lastPathSegment('/Pulse/jobs/job/ABC123/senior-planner?source=public')).toBe('senior-planner');
  });
});
