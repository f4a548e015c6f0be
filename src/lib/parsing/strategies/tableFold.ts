import type { DirectoryEntry } from '@/lib/parsing/directory/directory';
import {
  applyYearCounter,
  scanLineDates,
  toDutyDate,
  type DateToken,
  type DatedToken,
} from '@/lib/parsing/dateTokens';
import { foldLines, foldPages } from '@/lib/parsing/fold';
import { pageReporter, type PageReporter } from '@/lib/parsing/issues';
import { classifyLine, findLabel } from '@/lib/parsing/text';
import type { DutyFact, LineStep, ParseContext } from '@/lib/parsing/types';

export type TableFoldState = {
  year: number;
  pendingDates: DatedToken[];
  pendingEntry: DirectoryEntry | null;
};

export type TableFoldOptions = {
  locationId: string;
  entries: readonly DirectoryEntry[];
  /** Also read the "DOMINGO 31 DE AGOSTO Y LUNES 1 DE SEPTIEMBRE" sentence. */
  transitional: boolean;
  dedupeDates: boolean;
  /** Where dates and labels still waiting for their partner are dropped. */
  flushPendingAt: 'page' | 'document';
};

export function initialTableState(year: number): TableFoldState {
  return { year, pendingDates: [], pendingEntry: null };
}

function dedupe(tokens: readonly DateToken[]): DateToken[] {
  const seen = new Set<string>();
  return tokens.filter((token) => {
    const key = `${token.day}-${token.month}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

function emit(
  locationId: string,
  dated: readonly DatedToken[],
  entry: DirectoryEntry,
): DutyFact[] {
  return dated.map((token) => ({
    locationId,
    date: toDutyDate(token),
    span: entry.span,
    pharmacy: entry.pharmacy,
  }));
}

function describeDates(dated: readonly DatedToken[]): string {
  return dated.map((token) => token.raw).join(' ');
}

export function flushPending(
  state: TableFoldState,
  report: PageReporter,
): TableFoldState {
  if (state.pendingDates.length > 0) {
    report(
      'incomplete-line',
      `Dropped dates with no pharmacy label: ${describeDates(state.pendingDates)}`,
    );
  }
  if (state.pendingEntry) {
    report(
      'incomplete-line',
      `Dropped pharmacy label with no dates: ${state.pendingEntry.label}`,
    );
  }
  return initialTableState(state.year);
}

/**
 * One step of the table fold. Dates and a label on the same line resolve at
 * once; otherwise whichever arrives first waits for the other.
 */
export function tableLineStep(
  options: TableFoldOptions,
  report: PageReporter,
): (state: TableFoldState, line: string) => LineStep<TableFoldState> {
  return (state, line) => {
    const scan = scanLineDates(line, { transitional: options.transitional });
    for (const raw of scan.rejected) {
      report('unresolvable-date', `Discarded "${raw}" in "${line}"`);
    }
    const tokens = options.dedupeDates ? dedupe(scan.tokens) : scan.tokens;
    const entry = findLabel(line, options.entries);

    switch (classifyLine(tokens.length > 0, entry !== null)) {
      case 'none': {
        report('unrecognized-line', line);
        return { state, facts: [] };
      }
      case 'label': {
        if (!entry) return { state, facts: [] };
        if (state.pendingDates.length > 0) {
          return {
            state: initialTableState(state.year),
            facts: emit(options.locationId, state.pendingDates, entry),
          };
        }
        if (state.pendingEntry) {
          report(
            'incomplete-line',
            `Label ${state.pendingEntry.label} replaced by ${entry.label} before any dates`,
          );
        }
        return { state: { ...state, pendingEntry: entry }, facts: [] };
      }
      case 'dates': {
        const { year, dated } = applyYearCounter(state.year, tokens);
        if (state.pendingEntry) {
          return {
            state: initialTableState(year),
            facts: emit(options.locationId, dated, state.pendingEntry),
          };
        }
        if (state.pendingDates.length > 0) {
          report(
            'incomplete-line',
            `Dropped dates with no pharmacy label: ${describeDates(state.pendingDates)}`,
          );
        }
        return {
          state: { year, pendingDates: dated, pendingEntry: null },
          facts: [],
        };
      }
      case 'both': {
        if (!entry) return { state, facts: [] };
        const { year, dated } = applyYearCounter(state.year, tokens);
        const cleared = flushPending(state, report);
        return {
          state: { ...cleared, year },
          facts: emit(options.locationId, dated, entry),
        };
      }
    }
  };
}

export function runTableFold(
  pages: readonly string[],
  seedYear: number,
  options: TableFoldOptions,
  context: ParseContext,
): DutyFact[] {
  const result = foldPages(
    pages,
    initialTableState(seedYear),
    (state, lines, page) => {
      const report = pageReporter(context.report, page);
      const folded = foldLines(lines, state, tableLineStep(options, report));
      if (options.flushPendingAt === 'page') {
        return { state: flushPending(folded.state, report), facts: folded.facts };
      }
      return folded;
    },
    context,
  );
  if (options.flushPendingAt === 'document') {
    flushPending(result.state, pageReporter(context.report, null));
  }
  return result.facts;
}
