import { spanKey } from '@/lib/duty/timeSpans';
import type {
  Pharmacy,
  PharmacySchedule,
  SchedulesByLocation,
} from '@/lib/duty/types';
import type {
  DerivationRule,
  DirectoryEntry,
} from '@/lib/parsing/directory/directory';
import { firstOccurrence } from '@/lib/parsing/text';
import type { ParseIssue } from '@/lib/parsing/types';

const DAYS_PER_WEEK = 7;

function shiftsFor(entries: readonly DirectoryEntry[]): Record<string, Pharmacy[]> {
  const shifts: Record<string, Pharmacy[]> = {};
  for (const entry of entries) {
    const key = spanKey(entry.span);
    shifts[key] = [...(shifts[key] ?? []), entry.pharmacy];
  }
  return shifts;
}

/** 1-based week of a scaffold position: entries 0-6 are week 1. */
export function weekNumber(index: number): number {
  return Math.floor(index / DAYS_PER_WEEK) + 1;
}

/** Odd weeks go to `first`, even weeks to `second`. */
export function deriveAlternating(params: {
  scaffold: readonly PharmacySchedule[];
  first: DirectoryEntry;
  second: DirectoryEntry;
}): PharmacySchedule[] {
  return params.scaffold.map((schedule, index) => {
    const entry = weekNumber(index) % 2 === 1 ? params.first : params.second;
    return { date: schedule.date, shifts: shiftsFor([entry]) };
  });
}

export function deriveFixed(params: {
  scaffold: readonly PharmacySchedule[];
  entries: readonly DirectoryEntry[];
}): PharmacySchedule[] {
  return params.scaffold.map((schedule) => ({
    date: schedule.date,
    shifts: shiftsFor(params.entries),
  }));
}

/**
 * Orders two candidates by where their labels first appear in the document.
 * A label that never appears sorts last.
 */
export function orderByFirstOccurrence(
  documentText: string,
  candidates: readonly [DirectoryEntry, DirectoryEntry],
): { first: DirectoryEntry; second: DirectoryEntry; found: boolean } {
  const [a, b] = candidates;
  const aIndex = firstOccurrence(documentText, a.label);
  const bIndex = firstOccurrence(documentText, b.label);
  if (aIndex === null && bIndex === null) {
    return { first: a, second: b, found: false };
  }
  const aFirst =
    bIndex === null || (aIndex !== null && aIndex <= bIndex);
  return aFirst
    ? { first: a, second: b, found: true }
    : { first: b, second: a, found: true };
}

/**
 * Builds the schedules of zones the bulletin never states directly, using a
 * sibling zone's dates as scaffold. Zones whose scaffold is empty, and
 * alternating zones with neither candidate printed, are left out.
 */
export function deriveZbsSchedules(params: {
  schedules: SchedulesByLocation;
  rules: readonly DerivationRule[];
  documentText: string;
  report: (issue: ParseIssue) => void;
}): SchedulesByLocation {
  const derived: SchedulesByLocation = {};

  for (const rule of params.rules) {
    const scaffold = params.schedules[rule.scaffold] ?? [];
    if (scaffold.length === 0) {
      params.report({
        kind: 'derivation-skipped',
        page: null,
        detail: `No ${rule.scaffold} schedules to derive ${rule.zoneId} from`,
      });
      continue;
    }

    switch (rule.rule) {
      case 'alternating': {
        const order = orderByFirstOccurrence(params.documentText, rule.candidates);
        if (!order.found) {
          params.report({
            kind: 'derivation-skipped',
            page: null,
            detail: `Neither ${rule.zoneId} candidate appears in the document`,
          });
          continue;
        }
        derived[rule.zoneId] = deriveAlternating({
          scaffold,
          first: order.first,
          second: order.second,
        });
        break;
      }
      case 'fixed': {
        derived[rule.zoneId] = deriveFixed({
          scaffold,
          entries: rule.pharmacies,
        });
        break;
      }
    }
  }

  return derived;
}
