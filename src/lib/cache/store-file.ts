import { mkdir, readFile, rename, unlink, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { ScheduleCacheStore, WriteRegionParams } from '@/lib/cache/store';
import {
  CACHE_VERSION,
  cacheFileSchema,
  cacheHeaderSchema,
  type CacheFile,
  type CacheHeader,
} from '@/lib/cache/types';
import { locationsForRegion, type RegionId } from '@/lib/duty/locations';
import { getDataDir } from '@/lib/env';
import { logDebug } from '@/lib/log';

const LOCATION_ID_REGEX = /^[a-z0-9-]+$/;

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function serializeCacheFile(file: CacheFile): string {
  return JSON.stringify(file, null, 2) + '\n';
}

let writeChain: Promise<void> = Promise.resolve();

async function withWriteLock<T>(fn: () => Promise<T>): Promise<T> {
  const previous = writeChain;
  let release: (() => void) | undefined;
  writeChain = new Promise<void>((resolve) => {
    release = resolve;
  });

  await previous;
  try {
    return await fn();
  } finally {
    release?.();
  }
}

export class FileScheduleCacheStore implements ScheduleCacheStore {
  private readonly dataDir: string | null;

  constructor(options: { dataDir?: string } = {}) {
    this.dataDir = options.dataDir ?? null;
  }

  private getCacheDir(): string {
    return path.join(this.dataDir ?? getDataDir(), 'cache');
  }

  private getCacheFilePath(locationId: string): string {
    if (!LOCATION_ID_REGEX.test(locationId)) {
      throw new Error(`Invalid location id: ${locationId}`);
    }
    return path.join(this.getCacheDir(), `${locationId}.json`);
  }

  private async readRaw(locationId: string): Promise<unknown> {
    const filePath = this.getCacheFilePath(locationId);
    try {
      const contents = await readFile(filePath, 'utf8');
      const parsedJson: unknown = JSON.parse(contents);
      return parsedJson;
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  async readHeader(locationId: string): Promise<CacheHeader | null> {
    const raw = await this.readRaw(locationId);
    if (raw === null) return null;
    const parsed = cacheHeaderSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(
        `Invalid cache file format at ${this.getCacheFilePath(locationId)}`,
      );
    }
    return parsed.data;
  }

  async readSchedules(locationId: string): Promise<CacheFile | null> {
    const header = await this.readHeader(locationId);
    if (!header || header.version !== CACHE_VERSION) return null;

    const parsed = cacheFileSchema.safeParse(await this.readRaw(locationId));
    if (!parsed.success) {
      throw new Error(
        `Invalid cache file format at ${this.getCacheFilePath(locationId)}`,
      );
    }
    return parsed.data;
  }

  private async writeCacheFileAtomic(file: CacheFile): Promise<void> {
    const dir = this.getCacheDir();
    const filePath = this.getCacheFilePath(file.locationId);
    const tmpPath = path.join(
      dir,
      `${file.locationId}.json.tmp.${process.pid}.${Date.now()}`,
    );

    await mkdir(dir, { recursive: true });
    await writeFile(tmpPath, serializeCacheFile(file), 'utf8');
    await rename(tmpPath, filePath);
  }

  /** Writes every location of the region; locations without schedules get an empty list. */
  async writeRegion(params: WriteRegionParams): Promise<void> {
    const savedAt = params.savedAt ?? new Date().toISOString();
    const files = locationsForRegion(params.regionId).map((location) => {
      const parsed = cacheFileSchema.safeParse({
        version: CACHE_VERSION,
        locationId: location.id,
        regionId: params.regionId,
        sourceLastModified: params.sourceLastModified,
        savedAt,
        schedules: params.schedules[location.id] ?? [],
      });
      if (!parsed.success) {
        throw new Error(`Refusing to write invalid cache for ${location.id}.`);
      }
      return parsed.data;
    });

    await withWriteLock(async () => {
      for (const file of files) {
        await this.writeCacheFileAtomic(file);
      }
    });
    logDebug('cache', `wrote ${files.length} location(s) for ${params.regionId}`);
  }

  async invalidateRegion(regionId: RegionId): Promise<void> {
    const locations = locationsForRegion(regionId);
    await withWriteLock(async () => {
      for (const location of locations) {
        try {
          await unlink(this.getCacheFilePath(location.id));
        } catch (err) {
          if (!isNotFound(err)) throw err;
        }
      }
    });
    logDebug('cache', `invalidated ${locations.length} location(s) for ${regionId}`);
  }
}

export const scheduleCacheStore = new FileScheduleCacheStore();
