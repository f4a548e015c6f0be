import { DateTime } from 'luxon';

import { toIsoDate } from '@/lib/duty/dates';
import {
  crossesMidnight,
  parseSpanKey,
  type DutyTimeSpan,
} from '@/lib/duty/timeSpans';
import type { DutyDate, Pharmacy, PharmacySchedule } from '@/lib/duty/types';
import { getDefaultTimezone } from '@/lib/env';

/** Half-open `[start, end)` window of one shift. */
export type ShiftWindow = { start: DateTime; end: DateTime };

export type ActiveDuty = {
  date: DutyDate;
  spanKey: string;
  span: DutyTimeSpan;
  pharmacies: Pharmacy[];
  window: ShiftWindow;
};

/**
 * A shift belongs to the date it starts on, so a night shift ends the next
 * morning. Shifts ending at 23:59 run until midnight.
 */
export function shiftWindow(
  date: DutyDate,
  span: DutyTimeSpan,
  options: { zone: string; fallbackYear: number },
): ShiftWindow | null {
  const day = DateTime.fromISO(toIsoDate(date, options.fallbackYear), {
    zone: options.zone,
  });
  if (!day.isValid) return null;

  const start = day.set({ hour: span.startHour, minute: span.startMinute });
  let end = day.set({ hour: span.endHour, minute: span.endMinute });
  if (crossesMidnight(span)) end = end.plus({ days: 1 });
  if (span.endHour === 23 && span.endMinute === 59) {
    end = end.plus({ minutes: 1 });
  }
  return { start, end };
}

export function findActiveDuties(
  schedules: readonly PharmacySchedule[],
  params: { at: DateTime; zone?: string },
): ActiveDuty[] {
  const zone = params.zone ?? getDefaultTimezone();
  const at = params.at.setZone(zone);
  const atMs = at.toMillis();

  const active: ActiveDuty[] = [];
  for (const schedule of schedules) {
    for (const [key, pharmacies] of Object.entries(schedule.shifts)) {
      const span = parseSpanKey(key);
      if (!span) continue;
      const window = shiftWindow(schedule.date, span, {
        zone,
        fallbackYear: at.year,
      });
      if (!window) continue;
      if (atMs >= window.start.toMillis() && atMs < window.end.toMillis()) {
        active.push({ date: schedule.date, spanKey: key, span, pharmacies, window });
      }
    }
  }
  return active.sort((a, b) => a.window.start.toMillis() - b.window.start.toMillis());
}
