import { describe, expect, it } from 'vitest';

import { evaluateCacheEntry, evaluateCacheGroup } from '@/lib/cache/state';
import { CACHE_VERSION, type CacheHeader } from '@/lib/cache/types';

function header(overrides: Partial<CacheHeader> = {}): CacheHeader {
  return {
    version: CACHE_VERSION,
    locationId: 'cuellar',
    regionId: 'cuellar',
    sourceLastModified: '2025-01-10T09:00:00.000Z',
    savedAt: '2025-01-10T09:05:00.000Z',
    ...overrides,
  };
}

describe('evaluateCacheEntry', () => {
  it('is missing without a header', () => {
    expect(evaluateCacheEntry(null, { sourceLastModified: null })).toEqual({
      status: 'missing',
    });
  });

  it('flags an older cache version', () => {
    expect(
      evaluateCacheEntry(header({ version: 1 }), { sourceLastModified: null }),
    ).toEqual({ status: 'stale-version', cachedVersion: 1, expectedVersion: CACHE_VERSION });
  });

  it('flags a bulletin newer than the cache', () => {
    expect(
      evaluateCacheEntry(header(), { sourceLastModified: '2025-02-01T00:00:00.000Z' }),
    ).toEqual({
      status: 'stale-timestamp',
      cachedLastModified: '2025-01-10T09:00:00.000Z',
      sourceLastModified: '2025-02-01T00:00:00.000Z',
    });
  });

  it('compares instants, not strings', () => {
    expect(
      evaluateCacheEntry(header(), { sourceLastModified: '2025-01-10T10:00:00+01:00' }),
    ).toEqual({ status: 'valid' });
  });

  it('only checks the version when the source date is unknown', () => {
    expect(evaluateCacheEntry(header(), { sourceLastModified: null })).toEqual({
      status: 'valid',
    });
  });
});

describe('evaluateCacheGroup', () => {
  it('takes the stalest location', () => {
    const state = evaluateCacheGroup([header(), header({ version: 1 }), null], {
      sourceLastModified: null,
    });
    expect(state.status).toBe('missing');

    const versionOnly = evaluateCacheGroup([header(), header({ version: 1 })], {
      sourceLastModified: '2025-03-01T00:00:00.000Z',
    });
    expect(versionOnly.status).toBe('stale-version');
  });

  it('treats an empty group as missing', () => {
    expect(evaluateCacheGroup([], { sourceLastModified: null })).toEqual({
      status: 'missing',
    });
  });
});
