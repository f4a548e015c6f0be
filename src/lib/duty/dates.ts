import { DateTime } from 'luxon';

import type { DutyDate } from '@/lib/duty/types';

export const SPANISH_MONTHS = [
  'enero',
  'febrero',
  'marzo',
  'abril',
  'mayo',
  'junio',
  'julio',
  'agosto',
  'septiembre',
  'octubre',
  'noviembre',
  'diciembre',
] as const;

export type SpanishMonth = (typeof SPANISH_MONTHS)[number];

export const MONTH_ABBREVIATIONS = [
  'ene',
  'feb',
  'mar',
  'abr',
  'may',
  'jun',
  'jul',
  'ago',
  'sep',
  'oct',
  'nov',
  'dic',
] as const;

// Indexed by luxon weekday (1 = Monday) minus one.
const SPANISH_WEEKDAYS = [
  'lunes',
  'martes',
  'miércoles',
  'jueves',
  'viernes',
  'sábado',
  'domingo',
] as const;

export function monthNumber(month: SpanishMonth): number {
  return SPANISH_MONTHS.indexOf(month) + 1;
}

export function monthFromAbbreviation(raw: string): SpanishMonth | null {
  const token = raw.trim().toLowerCase();
  const index = MONTH_ABBREVIATIONS.findIndex((abbr) => abbr === token);
  return index === -1 ? null : SPANISH_MONTHS[index];
}

export function monthFromName(raw: string): SpanishMonth | null {
  const token = raw.trim().toLowerCase();
  const index = SPANISH_MONTHS.findIndex((name) => name === token);
  return index === -1 ? null : SPANISH_MONTHS[index];
}

export function weekdayName(
  year: number,
  month: SpanishMonth,
  day: number,
): string | null {
  const dt = DateTime.fromObject({ year, month: monthNumber(month), day });
  if (!dt.isValid) return null;
  return SPANISH_WEEKDAYS[dt.weekday - 1];
}

export function makeDutyDate(params: {
  day: number;
  month: SpanishMonth;
  year?: number;
  dayOfWeek?: string | null;
}): DutyDate {
  const { day, month, year } = params;
  if (year === undefined) {
    return { dayOfWeek: params.dayOfWeek ?? null, day, month };
  }
  return {
    dayOfWeek: params.dayOfWeek ?? weekdayName(year, month, day),
    day,
    month,
    year,
  };
}

/** Formats a date back into its bulletin token, e.g. `05-mar`. */
export function formatDutyToken(date: DutyDate): string {
  const abbr = MONTH_ABBREVIATIONS[monthNumber(date.month) - 1];
  return `${String(date.day).padStart(2, '0')}-${abbr}`;
}

export function dutyDateKey(date: DutyDate): string {
  return `${date.year ?? '?'}-${monthNumber(date.month)}-${date.day}`;
}

export function toIsoDate(date: DutyDate, fallbackYear: number): string {
  const year = date.year ?? fallbackYear;
  const month = monthNumber(date.month);
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(date.day).padStart(2, '0')}`;
}

export function compareDutyDates(
  a: DutyDate,
  b: DutyDate,
  currentYear: number,
): number {
  const yearDiff = (a.year ?? currentYear) - (b.year ?? currentYear);
  if (yearDiff !== 0) return yearDiff;
  const monthDiff = monthNumber(a.month) - monthNumber(b.month);
  if (monthDiff !== 0) return monthDiff;
  return a.day - b.day;
}

export function sortByDutyDate<T extends { date: DutyDate }>(
  items: readonly T[],
  currentYear: number,
): T[] {
  return [...items].sort((a, b) =>
    compareDutyDates(a.date, b.date, currentYear),
  );
}
