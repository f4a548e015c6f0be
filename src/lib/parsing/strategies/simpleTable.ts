import { assembleSchedules } from '@/lib/parsing/assembler';
import { pharmacyDirectory } from '@/lib/parsing/directory/directory';
import { runTableFold } from '@/lib/parsing/strategies/tableFold';
import type { RegionStrategy } from '@/lib/parsing/types';

const LOCATION_ID = 'el-espinar';

// El Espinar: one label per block of dates; bulletins open in the December
// before their nominal year.
export const simpleTableStrategy: RegionStrategy = {
  kind: 'simple-table',
  parse(pages, context) {
    const seedYear = context.seedYear ?? context.currentYear - 1;
    const facts = runTableFold(
      pages,
      seedYear,
      {
        locationId: LOCATION_ID,
        entries: pharmacyDirectory.elEspinar,
        transitional: false,
        dedupeDates: true,
        flushPendingAt: 'page',
      },
      context,
    );
    return {
      schedules: assembleSchedules(facts, {
        currentYear: context.currentYear,
        locationIds: [LOCATION_ID],
      }),
      yearDetection: null,
    };
  },
};
