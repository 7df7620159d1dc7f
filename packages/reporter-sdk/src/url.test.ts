import { describe, it, expect } from 'vitest';
import { urlJoin } from './url.js';
import { DEFAULT_BASE_URL, ENDPOINTS } from './constants.js';

describe('urlJoin', () => {
  it.each([
    ['https://x/y/', 'update'],
    ['https://x/y', 'update'],
    ['https://x/y/', '/update'],
    ['https://x/y', '/update'],
  ])('should join %s and %s with a single separator', (base, segment) => {
    expect(urlJoin(base, segment)).toBe('https://x/y/update');
  });

  it('should join multiple segments', () => {
    expect(urlJoin('https://example.com/api/', '/v1/', 'update')).toBe(
      'https://example.com/api/v1/update'
    );
  });

  it('should collapse repeated trailing separators', () => {
    expect(urlJoin('https://x/y//', 'update')).toBe('https://x/y/update');
  });

  it('should return the base without a trailing separator when no segments are given', () => {
    expect(urlJoin('https://x/y/')).toBe('https://x/y');
  });

  it('should build the access check URL from the default endpoint', () => {
    expect(urlJoin(DEFAULT_BASE_URL, ENDPOINTS.CHECK_ACCESS)).toBe(
      'https://us-central1-kerastuner-prod.cloudfunctions.net/api/v1/check-access'
    );
  });
});
