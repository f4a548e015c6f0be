import { assembleSchedules } from '@/lib/parsing/assembler';
import { pharmacyDirectory } from '@/lib/parsing/directory/directory';
import { resolveBaseYear } from '@/lib/parsing/strategies/baseYear';
import { runTableFold } from '@/lib/parsing/strategies/tableFold';
import type { RegionStrategy } from '@/lib/parsing/types';

const LOCATION_ID = 'cuellar';

// Cuéllar: weekly blocks of several dates plus one label, with the
// August/September hand-over written out as a sentence.
export const compositeTableStrategy: RegionStrategy = {
  kind: 'composite-table',
  parse(pages, context) {
    const { year, yearDetection } = resolveBaseYear(pages, context);
    const facts = runTableFold(
      pages,
      year,
      {
        locationId: LOCATION_ID,
        entries: pharmacyDirectory.cuellar,
        transitional: true,
        dedupeDates: false,
        flushPendingAt: 'document',
      },
      context,
    );
    return {
      schedules: assembleSchedules(facts, {
        currentYear: context.currentYear,
        locationIds: [LOCATION_ID],
      }),
      yearDetection,
    };
  },
};
