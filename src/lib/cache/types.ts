import { z } from 'zod';

import { REGION_IDS } from '@/lib/duty/locations';
import { pharmacyScheduleSchema } from '@/lib/duty/types';

/** Bump when the cached schedule shape changes; older files then re-parse. */
export const CACHE_VERSION = 2;

const isoDateTimeSchema = z.string().datetime({ offset: true });

export const cacheHeaderSchema = z.object({
  version: z.number().int(),
  locationId: z.string().min(1),
  regionId: z.enum(REGION_IDS),
  sourceLastModified: isoDateTimeSchema,
  savedAt: isoDateTimeSchema,
});

export type CacheHeader = z.infer<typeof cacheHeaderSchema>;

export const cacheFileSchema = cacheHeaderSchema.extend({
  version: z.literal(CACHE_VERSION),
  schedules: z.array(pharmacyScheduleSchema),
});

export type CacheFile = z.infer<typeof cacheFileSchema>;
