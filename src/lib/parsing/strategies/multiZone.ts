import { assembleSchedules } from '@/lib/parsing/assembler';
import {
  pharmacyDirectory,
  type DirectoryEntry,
  type ZoneDirectory,
} from '@/lib/parsing/directory/directory';
import { scanTwoDigitYearDates, toDutyDate } from '@/lib/parsing/dateTokens';
import { foldLines, foldPages } from '@/lib/parsing/fold';
import { pageReporter } from '@/lib/parsing/issues';
import { resolveBaseYear } from '@/lib/parsing/strategies/baseYear';
import { deriveZbsSchedules } from '@/lib/parsing/strategies/zbsDerivation';
import { classifyLine, findAllLabels } from '@/lib/parsing/text';
import type { DutyFact, LineStep, RegionStrategy } from '@/lib/parsing/types';

type ZoneMatch = { zoneId: string; entry: DirectoryEntry };

export function matchZones(
  line: string,
  zones: readonly ZoneDirectory[],
): ZoneMatch[] {
  return zones.flatMap((zone) =>
    findAllLabels(line, zone.entries).map((entry) => ({
      zoneId: zone.zoneId,
      entry,
    })),
  );
}

// Segovia Rural: each line carries one dated row naming pharmacies of
// several zones at once.
export const multiZoneStrategy: RegionStrategy = {
  kind: 'multi-zone',
  parse(pages, context) {
    const zones = pharmacyDirectory.ruralZones;
    const { year: baseYear, yearDetection } = resolveBaseYear(pages, context);

    const { facts } = foldPages(
      pages,
      null,
      (state, lines, page) => {
        const report = pageReporter(context.report, page);
        return foldLines(lines, state, (lineState, line): LineStep<null> => {
          const scan = scanTwoDigitYearDates(line, baseYear);
          for (const raw of scan.rejected) {
            report('unresolvable-date', `Discarded "${raw}" in "${line}"`);
          }
          const matches = matchZones(line, zones);

          switch (classifyLine(scan.tokens.length > 0, matches.length > 0)) {
            case 'none':
              report('unrecognized-line', line);
              return { state: lineState, facts: [] };
            case 'dates':
              report('incomplete-line', `No zone pharmacy on dated line "${line}"`);
              return { state: lineState, facts: [] };
            case 'label':
              report('incomplete-line', `No date on line "${line}"`);
              return { state: lineState, facts: [] };
            case 'both': {
              const date = toDutyDate(scan.tokens[0]);
              const lineFacts: DutyFact[] = matches.map((match) => ({
                locationId: match.zoneId,
                date,
                span: match.entry.span,
                pharmacy: match.entry.pharmacy,
              }));
              return { state: lineState, facts: lineFacts };
            }
          }
        });
      },
      context,
    );

    const direct = assembleSchedules(facts, {
      currentYear: context.currentYear,
      locationIds: zones.map((zone) => zone.zoneId),
    });
    const derived = deriveZbsSchedules({
      schedules: direct,
      rules: pharmacyDirectory.derivations,
      documentText: pages.join('\n'),
      report: context.report,
    });

    return { schedules: { ...direct, ...derived }, yearDetection };
  },
};
