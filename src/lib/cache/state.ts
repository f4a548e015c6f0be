import { DateTime } from 'luxon';

import { CACHE_VERSION, type CacheHeader } from '@/lib/cache/types';

export type CacheState =
  | { status: 'valid' }
  | { status: 'missing' }
  | { status: 'stale-version'; cachedVersion: number; expectedVersion: number }
  | {
      status: 'stale-timestamp';
      cachedLastModified: string;
      sourceLastModified: string;
    };

export type CacheStatus = CacheState['status'];

// Higher wins when a region's locations disagree.
const PRECEDENCE: Record<CacheStatus, number> = {
  valid: 0,
  'stale-timestamp': 1,
  'stale-version': 2,
  missing: 3,
};

export type CacheCheck = {
  /** Last-modified of the bulletin on offer; null when unknown. */
  sourceLastModified: string | null;
  expectedVersion?: number;
};

export function evaluateCacheEntry(
  header: CacheHeader | null,
  check: CacheCheck,
): CacheState {
  if (!header) return { status: 'missing' };

  const expectedVersion = check.expectedVersion ?? CACHE_VERSION;
  if (header.version !== expectedVersion) {
    return {
      status: 'stale-version',
      cachedVersion: header.version,
      expectedVersion,
    };
  }

  if (check.sourceLastModified === null) return { status: 'valid' };

  const cached = DateTime.fromISO(header.sourceLastModified);
  const source = DateTime.fromISO(check.sourceLastModified);
  if (!cached.isValid || !source.isValid || cached.toMillis() < source.toMillis()) {
    return {
      status: 'stale-timestamp',
      cachedLastModified: header.sourceLastModified,
      sourceLastModified: check.sourceLastModified,
    };
  }
  return { status: 'valid' };
}

/** A region is only as fresh as its stalest location. */
export function evaluateCacheGroup(
  headers: ReadonlyArray<CacheHeader | null>,
  check: CacheCheck,
): CacheState {
  if (headers.length === 0) return { status: 'missing' };
  return headers
    .map((header) => evaluateCacheEntry(header, check))
    .reduce((worst, state) =>
      PRECEDENCE[state.status] > PRECEDENCE[worst.status] ? state : worst,
    );
}
