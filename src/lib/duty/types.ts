import { z } from 'zod';

import { SPANISH_MONTHS } from '@/lib/duty/dates';
import { spanKeySchema } from '@/lib/duty/timeSpans';

export const dutyDateSchema = z.object({
  dayOfWeek: z.string().min(1).nullable(),
  day: z.number().int().min(1).max(31),
  month: z.enum(SPANISH_MONTHS),
  year: z.number().int().optional(),
});

export type DutyDate = z.infer<typeof dutyDateSchema>;

export const pharmacySchema = z.object({
  name: z.string().min(1),
  address: z.string().min(1),
  phone: z.string().min(1),
  additionalInfo: z.string().min(1).optional(),
});

export type Pharmacy = z.infer<typeof pharmacySchema>;

export const pharmacyScheduleSchema = z.object({
  date: dutyDateSchema,
  shifts: z
    .record(spanKeySchema, z.array(pharmacySchema).min(1))
    .refine(
      (shifts) => Object.keys(shifts).length > 0,
      'Expected at least one shift',
    ),
});

/** One calendar day at one location; shifts are keyed by `spanKey`. */
export type PharmacySchedule = z.infer<typeof pharmacyScheduleSchema>;

export type SchedulesByLocation = Record<string, PharmacySchedule[]>;
