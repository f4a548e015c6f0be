import { z } from 'zod';

import { ZBS_IDS, type ZbsId } from '@/lib/duty/locations';
import {
  DUTY_TIME_SPANS,
  dutyTimeSpanIdSchema,
  type DutyTimeSpan,
} from '@/lib/duty/timeSpans';
import type { Pharmacy } from '@/lib/duty/types';
import type { LabelMatchMode } from '@/lib/parsing/text';
import rawDirectory from '@/lib/parsing/directory/pharmacies.json';

export type DirectoryEntry = {
  /** Short text the bulletin prints for this pharmacy. */
  label: string;
  match: LabelMatchMode;
  span: DutyTimeSpan;
  pharmacy: Pharmacy;
};

const entrySchema = z
  .object({
    label: z.string().min(1),
    match: z.enum(['contains', 'suffix']).default('contains'),
    shift: dutyTimeSpanIdSchema,
    name: z.string().min(1),
    address: z.string().min(1),
    phone: z.string().min(1),
  })
  .transform(
    (entry): DirectoryEntry => ({
      label: entry.label.normalize('NFC'),
      match: entry.match,
      span: DUTY_TIME_SPANS[entry.shift],
      pharmacy: {
        name: entry.name,
        address: entry.address,
        phone: entry.phone,
      },
    }),
  );

const zbsIdSchema = z.enum(ZBS_IDS);

const derivationSchema = z.discriminatedUnion('rule', [
  z.object({
    rule: z.literal('alternating'),
    scaffold: zbsIdSchema,
    candidates: z.tuple([entrySchema, entrySchema]),
  }),
  z.object({
    rule: z.literal('fixed'),
    scaffold: zbsIdSchema,
    pharmacies: z.array(entrySchema).min(1),
  }),
]);

const directorySchema = z.object({
  cuellar: z.array(entrySchema).min(1),
  'el-espinar': z.array(entrySchema).min(1),
  'segovia-rural': z.object({
    zones: z.record(zbsIdSchema, z.array(entrySchema).min(1)),
    derived: z.record(zbsIdSchema, derivationSchema),
  }),
});

export type DerivationRule = z.output<typeof derivationSchema> & {
  zoneId: ZbsId;
};

export type ZoneDirectory = {
  zoneId: ZbsId;
  entries: readonly DirectoryEntry[];
};

export type PharmacyDirectory = {
  cuellar: readonly DirectoryEntry[];
  elEspinar: readonly DirectoryEntry[];
  ruralZones: readonly ZoneDirectory[];
  derivations: readonly DerivationRule[];
};

export function loadPharmacyDirectory(raw: unknown): PharmacyDirectory {
  const parsed = directorySchema.safeParse(raw);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid pharmacy directory: ${message}`);
  }

  const rural = parsed.data['segovia-rural'];
  const ruralZones = ZBS_IDS.flatMap((zoneId): ZoneDirectory[] => {
    const entries = rural.zones[zoneId];
    return entries ? [{ zoneId, entries: Object.freeze(entries) }] : [];
  });
  const derivations = ZBS_IDS.flatMap((zoneId): DerivationRule[] => {
    const rule = rural.derived[zoneId];
    return rule ? [{ ...rule, zoneId }] : [];
  });

  return Object.freeze({
    cuellar: Object.freeze(parsed.data.cuellar),
    elEspinar: Object.freeze(parsed.data['el-espinar']),
    ruralZones: Object.freeze(ruralZones),
    derivations: Object.freeze(derivations),
  });
}

export const pharmacyDirectory = loadPharmacyDirectory(rawDirectory);
