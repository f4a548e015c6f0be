import { evaluateCacheGroup, type CacheState } from '@/lib/cache/state';
import type { ScheduleCacheStore } from '@/lib/cache/store';
import { scheduleCacheStore } from '@/lib/cache/store-file';
import { locationsForRegion, type RegionId } from '@/lib/duty/locations';
import { logDebug, logWarn } from '@/lib/log';
import { parseBulletin } from '@/lib/parsing/parse';
import type { ParseIssue } from '@/lib/parsing/types';
import type { YearDetectionResult } from '@/lib/parsing/yearDetection';

export type IngestParams = {
  regionId: RegionId;
  pages: readonly string[];
  sourceUrl?: string | null;
  /** ISO timestamp of the bulletin's last modification. */
  sourceLastModified: string;
  /** Re-parse even when the cache is current. */
  force?: boolean;
  now?: Date;
  store?: ScheduleCacheStore;
};

export type IngestResult =
  | { status: 'cached'; regionId: RegionId; cacheState: CacheState }
  | {
      status: 'parsed';
      regionId: RegionId;
      cacheState: CacheState;
      /** False when the result was not trustworthy enough to store. */
      stored: boolean;
      counts: Record<string, number>;
      yearDetection: YearDetectionResult | null;
      issues: ParseIssue[];
    }
  | {
      status: 'empty';
      regionId: RegionId;
      cacheState: CacheState;
      reason: 'no-text' | 'no-schedules';
      issues: ParseIssue[];
    };

export async function getRegionCacheState(
  regionId: RegionId,
  sourceLastModified: string | null,
  store: ScheduleCacheStore = scheduleCacheStore,
): Promise<CacheState> {
  const headers = await Promise.all(
    locationsForRegion(regionId).map((location) =>
      store.readHeader(location.id),
    ),
  );
  return evaluateCacheGroup(headers, { sourceLastModified });
}

// Runs for the same bulletin are shared; runs for a region are serialized so
// a later bulletin re-checks the cache written by the one before it.
const inFlight = new Map<string, Promise<IngestResult>>();
const regionTail = new Map<RegionId, Promise<IngestResult>>();

async function runIngest(params: IngestParams): Promise<IngestResult> {
  const store = params.store ?? scheduleCacheStore;
  const { regionId } = params;

  const cacheState = await getRegionCacheState(
    regionId,
    params.sourceLastModified,
    store,
  );
  if (cacheState.status === 'valid' && !params.force) {
    logDebug('ingest', `${regionId}: cache is current, skipping parse`);
    return { status: 'cached', regionId, cacheState };
  }

  const result = parseBulletin({
    regionId,
    pages: params.pages,
    sourceUrl: params.sourceUrl,
    now: params.now,
  });

  // The previous cache keeps serving when a bulletin yields nothing.
  if (result.status === 'empty') {
    logWarn('ingest', `${regionId}: bulletin produced no schedules (${result.reason})`);
    return {
      status: 'empty',
      regionId,
      cacheState,
      reason: result.reason,
      issues: result.issues,
    };
  }

  const counts: Record<string, number> = {};
  for (const [locationId, schedules] of Object.entries(result.schedules)) {
    counts[locationId] = schedules.length;
  }

  const trusted = result.yearDetection?.isValid ?? true;
  if (!trusted) {
    logWarn('ingest', `${regionId}: year could not be verified, not caching`);
  } else {
    await store.invalidateRegion(regionId);
    await store.writeRegion({
      regionId,
      schedules: result.schedules,
      sourceLastModified: params.sourceLastModified,
    });
  }

  return {
    status: 'parsed',
    regionId,
    cacheState,
    stored: trusted,
    counts,
    yearDetection: result.yearDetection,
    issues: result.issues,
  };
}

/** Parses and stores a bulletin unless the region's cache is still current. */
export async function ingestBulletin(
  params: IngestParams,
): Promise<IngestResult> {
  const { regionId } = params;
  const key = `${regionId}@${params.sourceLastModified}`;
  const running = inFlight.get(key);
  if (running) return running;

  const previous = regionTail.get(regionId);
  const run = () => runIngest(params);
  const task = (previous ? previous.then(run, run) : run()).finally(() => {
    if (inFlight.get(key) === task) inFlight.delete(key);
    if (regionTail.get(regionId) === task) regionTail.delete(regionId);
  });
  inFlight.set(key, task);
  regionTail.set(regionId, task);
  return task;
}
