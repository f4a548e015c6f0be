import { mkdtemp, readdir, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { FileScheduleCacheStore } from '@/lib/cache/store-file';
import { ingestBulletin } from '@/lib/bulletins/ingest';

const CUELLAR_PAGES = ['GUARDIAS CUÉLLAR 2025\n02-ene 03-ene STA. MARINA'];
const JANUARY = '2025-01-10T09:00:00.000Z';
const FEBRUARY = '2025-02-10T09:00:00.000Z';
const now = new Date('2025-01-15T12:00:00Z');

describe('ingestBulletin', () => {
  let dataDir: string;
  let store: FileScheduleCacheStore;

  beforeEach(async () => {
    dataDir = await mkdtemp(path.join(os.tmpdir(), 'duty-ingest-'));
    store = new FileScheduleCacheStore({ dataDir });
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it('parses and stores a bulletin the cache has not seen', async () => {
    const result = await ingestBulletin({
      regionId: 'cuellar',
      pages: CUELLAR_PAGES,
      sourceLastModified: JANUARY,
      now,
      store,
    });

    expect(result).toMatchObject({
      status: 'parsed',
      stored: true,
      counts: { cuellar: 2 },
      cacheState: { status: 'missing' },
    });
    const cached = await store.readSchedules('cuellar');
    expect(cached?.sourceLastModified).toBe(JANUARY);
    expect(cached?.schedules.map((s) => s.date.day)).toEqual([2, 3]);
  });

  it('skips parsing while the cache is current', async () => {
    await ingestBulletin({ regionId: 'cuellar', pages: CUELLAR_PAGES, sourceLastModified: JANUARY, now, store });

    const again = await ingestBulletin({
      regionId: 'cuellar',
      pages: CUELLAR_PAGES,
      sourceLastModified: JANUARY,
      now,
      store,
    });
    expect(again).toEqual({
      status: 'cached',
      regionId: 'cuellar',
      cacheState: { status: 'valid' },
    });

    const forced = await ingestBulletin({
      regionId: 'cuellar',
      pages: CUELLAR_PAGES,
      sourceLastModified: JANUARY,
      force: true,
      now,
      store,
    });
    expect(forced.status).toBe('parsed');
  });

  it('re-parses when the bulletin is newer than the cache', async () => {
    await ingestBulletin({ regionId: 'cuellar', pages: CUELLAR_PAGES, sourceLastModified: JANUARY, now, store });

    const result = await ingestBulletin({
      regionId: 'cuellar',
      pages: CUELLAR_PAGES,
      sourceLastModified: FEBRUARY,
      now,
      store,
    });
    expect(result).toMatchObject({
      status: 'parsed',
      cacheState: { status: 'stale-timestamp', cachedLastModified: JANUARY },
    });
    await expect(store.readHeader('cuellar')).resolves.toMatchObject({
      sourceLastModified: FEBRUARY,
    });
  });

  it('does not store schedules whose year was guessed', async () => {
    const result = await ingestBulletin({
      regionId: 'cuellar',
      pages: ['02-ene 03-ene STA. MARINA'],
      sourceLastModified: JANUARY,
      now,
      store,
    });

    expect(result).toMatchObject({
      status: 'parsed',
      stored: false,
      yearDetection: { source: 'fallback-current', isValid: false },
    });
    await expect(store.readHeader('cuellar')).resolves.toBeNull();
  });

  it('keeps the previous cache when a bulletin yields nothing', async () => {
    await ingestBulletin({ regionId: 'cuellar', pages: CUELLAR_PAGES, sourceLastModified: JANUARY, now, store });

    const result = await ingestBulletin({
      regionId: 'cuellar',
      pages: [''],
      sourceLastModified: FEBRUARY,
      now,
      store,
    });
    expect(result).toMatchObject({ status: 'empty', reason: 'no-text' });
    await expect(store.readHeader('cuellar')).resolves.toMatchObject({
      sourceLastModified: JANUARY,
    });
  });

  it('writes every rural zone, derived ones included', async () => {
    const result = await ingestBulletin({
      regionId: 'segovia-rural',
      pages: ['SERVICIOS DE URGENCIA RURALES 2025\n01-jun-25 COCA\nPlaza los Dolores'],
      sourceLastModified: JANUARY,
      now: new Date('2025-06-01T12:00:00Z'),
      store,
    });

    expect(result).toMatchObject({
      status: 'parsed',
      stored: true,
      counts: {
        'riaza-sepulveda': 0,
        'la-sierra': 0,
        fuentiduena: 0,
        carbonero: 0,
        'navas-asuncion': 1,
        villacastin: 0,
        'la-granja': 1,
        cantalejo: 1,
      },
    });
    const files = await readdir(path.join(dataDir, 'cache'));
    expect(files).toHaveLength(8);
  });

  it('caches the newer of two bulletins ingested at once', async () => {
    const [january, february] = await Promise.all([
      ingestBulletin({ regionId: 'cuellar', pages: CUELLAR_PAGES, sourceLastModified: JANUARY, now, store }),
      ingestBulletin({
        regionId: 'cuellar',
        pages: ['GUARDIAS CUÉLLAR 2025\n05-ene 06-ene 07-ene C/ RESINA'],
        sourceLastModified: FEBRUARY,
        now,
        store,
      }),
    ]);

    expect(january).toMatchObject({ status: 'parsed', counts: { cuellar: 2 } });
    expect(february).toMatchObject({
      status: 'parsed',
      stored: true,
      counts: { cuellar: 3 },
      cacheState: { status: 'stale-timestamp', cachedLastModified: JANUARY },
    });
    const cached = await store.readSchedules('cuellar');
    expect(cached?.sourceLastModified).toBe(FEBRUARY);
    expect(cached?.schedules.map((s) => s.date.day)).toEqual([5, 6, 7]);
  });

  it('does not let an older bulletin overwrite a newer one in flight', async () => {
    const [february, january] = await Promise.all([
      ingestBulletin({
        regionId: 'cuellar',
        pages: ['GUARDIAS CUÉLLAR 2025\n05-ene 06-ene 07-ene C/ RESINA'],
        sourceLastModified: FEBRUARY,
        now,
        store,
      }),
      ingestBulletin({ regionId: 'cuellar', pages: CUELLAR_PAGES, sourceLastModified: JANUARY, now, store }),
    ]);

    expect(february.status).toBe('parsed');
    expect(january).toEqual({
      status: 'cached',
      regionId: 'cuellar',
      cacheState: { status: 'valid' },
    });
    await expect(store.readHeader('cuellar')).resolves.toMatchObject({
      sourceLastModified: FEBRUARY,
    });
  });

  it('shares one run between concurrent calls for the same bulletin', async () => {
    const params = {
      regionId: 'el-espinar' as const,
      pages: ['02-ene HONTANILLA'],
      sourceLastModified: JANUARY,
      now,
      store,
    };
    const [first, second] = await Promise.all([ingestBulletin(params), ingestBulletin(params)]);
    expect(second).toBe(first);
  });
});
