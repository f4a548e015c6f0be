import { z } from 'zod';

export const DUTY_TIME_SPAN_IDS = [
  'full-day',
  'capital-day',
  'capital-night',
  'rural-daytime',
  'rural-extended-daytime',
] as const;

export type DutyTimeSpanId = (typeof DUTY_TIME_SPAN_IDS)[number];

export const dutyTimeSpanIdSchema = z.enum(DUTY_TIME_SPAN_IDS);

export type DutyTimeSpan = {
  startHour: number;
  startMinute: number;
  endHour: number;
  endMinute: number;
};

export const DUTY_TIME_SPANS: Record<DutyTimeSpanId, DutyTimeSpan> = {
  'full-day': { startHour: 0, startMinute: 0, endHour: 23, endMinute: 59 },
  'capital-day': {
    startHour: 10,
    startMinute: 15,
    endHour: 22,
    endMinute: 0,
  },
  'capital-night': {
    startHour: 22,
    startMinute: 0,
    endHour: 10,
    endMinute: 15,
  },
  'rural-daytime': {
    startHour: 10,
    startMinute: 0,
    endHour: 20,
    endMinute: 0,
  },
  'rural-extended-daytime': {
    startHour: 10,
    startMinute: 0,
    endHour: 22,
    endMinute: 0,
  },
};

const DISPLAY_NAMES: Record<DutyTimeSpanId, string> = {
  'full-day': '24 horas',
  'capital-day': 'Diurno',
  'capital-night': 'Nocturno',
  'rural-daytime': 'Diurno',
  'rural-extended-daytime': 'Diurno extendido',
};

const spanKeyRegex = /^(\d{1,2}):(\d{2})-(\d{1,2}):(\d{2})$/;

export const spanKeySchema = z.string().regex(spanKeyRegex, 'Expected H:MM-H:MM');

/** Spans are identified by their hours, so equal windows share a key. */
export function spanKey(span: DutyTimeSpan): string {
  const startMinute = String(span.startMinute).padStart(2, '0');
  const endMinute = String(span.endMinute).padStart(2, '0');
  return `${span.startHour}:${startMinute}-${span.endHour}:${endMinute}`;
}

export function parseSpanKey(key: string): DutyTimeSpan | null {
  const match = key.match(spanKeyRegex);
  if (!match) return null;
  const [startHour, startMinute, endHour, endMinute] = match
    .slice(1, 5)
    .map((part) => Number(part));
  if (startHour > 23 || endHour > 23) return null;
  if (startMinute > 59 || endMinute > 59) return null;
  return { startHour, startMinute, endHour, endMinute };
}

export function crossesMidnight(span: DutyTimeSpan): boolean {
  return (
    span.endHour * 60 + span.endMinute < span.startHour * 60 + span.startMinute
  );
}

export function findSpanId(span: DutyTimeSpan): DutyTimeSpanId | null {
  const key = spanKey(span);
  return (
    DUTY_TIME_SPAN_IDS.find((id) => spanKey(DUTY_TIME_SPANS[id]) === key) ??
    null
  );
}

export function spanDisplayName(span: DutyTimeSpan): string {
  const id = findSpanId(span);
  return id ? DISPLAY_NAMES[id] : `Guardia ${spanKey(span)}`;
}
