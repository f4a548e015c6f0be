export const REGION_IDS = [
  'segovia-capital',
  'cuellar',
  'el-espinar',
  'segovia-rural',
] as const;

export type RegionId = (typeof REGION_IDS)[number];

export const ZBS_IDS = [
  'riaza-sepulveda',
  'la-granja',
  'la-sierra',
  'fuentiduena',
  'carbonero',
  'navas-asuncion',
  'villacastin',
  'cantalejo',
] as const;

export type ZbsId = (typeof ZBS_IDS)[number];

export type Region = {
  id: RegionId;
  name: string;
  icon: string;
  bulletinUrl: string;
};

/** Zona Básica de Salud: one of the rural sub-areas. */
export type Zbs = {
  id: ZbsId;
  name: string;
  icon: string;
  notes: string;
};

export type DutyLocation = {
  id: string;
  regionId: RegionId;
  name: string;
  icon: string;
  notes: string | null;
};

const BULLETIN_BASE_URL = 'https://cofsegovia.com/wp-content/uploads';

export const REGIONS: readonly Region[] = [
  {
    id: 'segovia-capital',
    name: 'Segovia Capital',
    icon: '🏙',
    bulletinUrl: `${BULLETIN_BASE_URL}/2025/05/CALENDARIO-GUARDIAS-SEGOVIA-CAPITAL-DIA-2025.pdf`,
  },
  {
    id: 'cuellar',
    name: 'Cuéllar',
    icon: '🌳',
    bulletinUrl: `${BULLETIN_BASE_URL}/2025/01/GUARDIAS-CUELLAR_2025.pdf`,
  },
  {
    id: 'el-espinar',
    name: 'El Espinar / San Rafael',
    icon: '🏔️',
    bulletinUrl: `${BULLETIN_BASE_URL}/2025/01/Guardias-EL-ESPINAR_2025.pdf`,
  },
  {
    id: 'segovia-rural',
    name: 'Segovia Rural',
    icon: '🚜',
    bulletinUrl: `${BULLETIN_BASE_URL}/2025/06/SERVICIOS-DE-URGENCIA-RURALES-2025.pdf`,
  },
];

export const ZBS_LIST: readonly Zbs[] = [
  {
    id: 'riaza-sepulveda',
    name: 'Riaza / Sepúlveda',
    icon: '🏔️',
    notes: 'Mountain highland area',
  },
  {
    id: 'la-granja',
    name: 'La Granja',
    icon: '🏰',
    notes: 'Historic palace town area',
  },
  { id: 'la-sierra', name: 'La Sierra', icon: '⛰️', notes: 'Mountain range area' },
  {
    id: 'fuentiduena',
    name: 'Fuentidueña',
    icon: '🏞️',
    notes: 'Valley countryside area',
  },
  { id: 'carbonero', name: 'Carbonero', icon: '🌲', notes: 'Forest region area' },
  {
    id: 'navas-asuncion',
    name: 'Navas de la Asunción',
    icon: '🏘️',
    notes: 'Small town area',
  },
  {
    id: 'villacastin',
    name: 'Villacastín',
    icon: '🚂',
    notes: 'Railway junction town',
  },
  { id: 'cantalejo', name: 'Cantalejo', icon: '🏘️', notes: 'Rural town area' },
];

export function isRegionId(value: string): value is RegionId {
  return REGION_IDS.some((id) => id === value);
}

export function isZbsId(value: string): value is ZbsId {
  return ZBS_IDS.some((id) => id === value);
}

export function findRegion(id: string): Region | null {
  return REGIONS.find((region) => region.id === id) ?? null;
}

/** The rural region fans out to one location per ZBS; the others map to themselves. */
export function locationsForRegion(regionId: RegionId): DutyLocation[] {
  if (regionId === 'segovia-rural') {
    return ZBS_LIST.map((zbs) => ({
      id: zbs.id,
      regionId,
      name: zbs.name,
      icon: zbs.icon,
      notes: zbs.notes,
    }));
  }
  const region = REGIONS.find((r) => r.id === regionId);
  if (!region) return [];
  return [
    {
      id: region.id,
      regionId,
      name: region.name,
      icon: region.icon,
      notes: null,
    },
  ];
}

export function allLocations(): DutyLocation[] {
  return REGION_IDS.flatMap((regionId) => locationsForRegion(regionId));
}

export function findLocation(id: string): DutyLocation | null {
  return allLocations().find((location) => location.id === id) ?? null;
}
