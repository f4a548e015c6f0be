import type { CacheFile, CacheHeader } from '@/lib/cache/types';
import type { RegionId } from '@/lib/duty/locations';
import type { SchedulesByLocation } from '@/lib/duty/types';

export type WriteRegionParams = {
  regionId: RegionId;
  schedules: SchedulesByLocation;
  sourceLastModified: string;
  savedAt?: string;
};

export interface ScheduleCacheStore {
  readHeader(locationId: string): Promise<CacheHeader | null>;
  /** Null when nothing is cached or the file predates the current version. */
  readSchedules(locationId: string): Promise<CacheFile | null>;
  writeRegion(params: WriteRegionParams): Promise<void>;
  invalidateRegion(regionId: RegionId): Promise<void>;
}
