import { dutyDateKey, sortByDutyDate } from '@/lib/duty/dates';
import { spanKey } from '@/lib/duty/timeSpans';
import type {
  Pharmacy,
  PharmacySchedule,
  SchedulesByLocation,
} from '@/lib/duty/types';
import type { DutyFact } from '@/lib/parsing/types';

function samePharmacy(a: Pharmacy, b: Pharmacy): boolean {
  return (
    a.name === b.name &&
    a.address === b.address &&
    a.phone === b.phone &&
    a.additionalInfo === b.additionalInfo
  );
}

/**
 * Groups facts into one schedule per location and date, merging shifts that
 * arrive from different lines or pages. Listed `locationIds` are present in
 * the output even when no fact mentions them.
 */
export function assembleSchedules(
  facts: readonly DutyFact[],
  options: { currentYear: number; locationIds?: readonly string[] },
): SchedulesByLocation {
  const byLocation = new Map<string, Map<string, PharmacySchedule>>();
  for (const id of options.locationIds ?? []) byLocation.set(id, new Map());

  for (const fact of facts) {
    let byDate = byLocation.get(fact.locationId);
    if (!byDate) {
      byDate = new Map();
      byLocation.set(fact.locationId, byDate);
    }

    const dateKey = dutyDateKey(fact.date);
    const shiftKey = spanKey(fact.span);
    const existing = byDate.get(dateKey);
    if (!existing) {
      byDate.set(dateKey, {
        date: fact.date,
        shifts: { [shiftKey]: [fact.pharmacy] },
      });
      continue;
    }

    const current = existing.shifts[shiftKey] ?? [];
    if (current.some((p) => samePharmacy(p, fact.pharmacy))) continue;
    existing.shifts[shiftKey] = [...current, fact.pharmacy];
  }

  const out: SchedulesByLocation = {};
  for (const [locationId, byDate] of byLocation) {
    out[locationId] = sortByDutyDate([...byDate.values()], options.currentYear);
  }
  return out;
}

export function countSchedules(schedules: SchedulesByLocation): number {
  return Object.values(schedules).reduce((sum, list) => sum + list.length, 0);
}
