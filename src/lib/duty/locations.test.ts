import { describe, expect, it } from 'vitest';

import {
  allLocations,
  findLocation,
  isRegionId,
  locationsForRegion,
} from '@/lib/duty/locations';

describe('locations', () => {
  it('fans the rural region out to its eight zones', () => {
    const ids = locationsForRegion('segovia-rural').map((l) => l.id);
    expect(ids).toEqual([
      'riaza-sepulveda',
      'la-granja',
      'la-sierra',
      'fuentiduena',
      'carbonero',
      'navas-asuncion',
      'villacastin',
      'cantalejo',
    ]);
  });

  it('maps simple regions to a single location', () => {
    expect(locationsForRegion('cuellar')).toEqual([
      {
        id: 'cuellar',
        regionId: 'cuellar',
        name: 'Cuéllar',
        icon: '🌳',
        notes: null,
      },
    ]);
    expect(allLocations()).toHaveLength(11);
  });

  it('finds zones and rejects unknown ids', () => {
    expect(findLocation('la-granja')?.regionId).toBe('segovia-rural');
    expect(findLocation('madrid')).toBeNull();
    expect(isRegionId('el-espinar')).toBe(true);
    expect(isRegionId('la-granja')).toBe(false);
  });
});
