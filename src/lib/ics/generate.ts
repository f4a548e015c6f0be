import { DateTime } from 'luxon';

import { toIsoDate } from '@/lib/duty/dates';
import { parseSpanKey, spanDisplayName } from '@/lib/duty/timeSpans';
import type { Pharmacy, PharmacySchedule } from '@/lib/duty/types';
import { shiftWindow } from '@/lib/schedule/lookup';

function escapeIcsText(value: string): string {
  return value
    .replaceAll('\\', '\\\\')
    .replaceAll('\r\n', '\\n')
    .replaceAll('\n', '\\n')
    .replaceAll(',', '\\,')
    .replaceAll(';', '\\;');
}

function foldIcsLine(line: string): string {
  // RFC5545 suggests 75 octets; we approximate by characters.
  const max = 75;
  if (line.length <= max) return line;
  // Continuation lines start with a space, so they carry one character less.
  const out: string[] = [line.slice(0, max)];
  for (let i = max; i < line.length; i += max - 1) {
    out.push(` ${line.slice(i, i + max - 1)}`);
  }
  return out.join('\r\n');
}

function formatUtc(dt: DateTime): string {
  return dt.toUTC().toFormat("yyyyMMdd'T'HHmmss'Z'");
}

function describePharmacy(pharmacy: Pharmacy): string {
  return [
    pharmacy.name,
    pharmacy.address,
    `Tfno: ${pharmacy.phone}`,
    pharmacy.additionalInfo,
  ]
    .filter((part): part is string => typeof part === 'string')
    .join('\n');
}

type IcsEvent = {
  uid: string;
  start: DateTime;
  end: DateTime;
  summary: string;
  location: string;
  description: string;
};

export function generateIcs(params: {
  location: { id: string; name: string };
  schedules: readonly PharmacySchedule[];
  timezone: string;
  generatedAt?: DateTime;
  prodId?: string;
}): string {
  const prodId = params.prodId ?? '-//Farmacias de Guardia Segovia//ES';
  const dtStamp = params.generatedAt ?? DateTime.utc();
  const fallbackYear = dtStamp.setZone(params.timezone).year;

  const events: IcsEvent[] = [];
  for (const schedule of params.schedules) {
    for (const [key, pharmacies] of Object.entries(schedule.shifts)) {
      const span = parseSpanKey(key);
      if (!span || pharmacies.length === 0) continue;
      const window = shiftWindow(schedule.date, span, {
        zone: params.timezone,
        fallbackYear,
      });
      if (!window) continue;

      const isoDate = toIsoDate(schedule.date, fallbackYear);
      events.push({
        uid: `${params.location.id}-${isoDate}-${key.replaceAll(/\D/g, '')}@farmacias-guardia-segovia.local`,
        start: window.start,
        end: window.end,
        summary: `${spanDisplayName(span)}: ${pharmacies.map((p) => p.name).join(' / ')}`,
        location: pharmacies[0].address,
        description: pharmacies.map(describePharmacy).join('\n\n'),
      });
    }
  }
  events.sort((a, b) => a.start.toMillis() - b.start.toMillis());

  const lines: string[] = [
    'BEGIN:VCALENDAR',
    'VERSION:2.0',
    `PRODID:${escapeIcsText(prodId)}`,
    'CALSCALE:GREGORIAN',
    'METHOD:PUBLISH',
    foldIcsLine(
      `X-WR-CALNAME:${escapeIcsText(`Farmacias de guardia - ${params.location.name}`)}`,
    ),
    `X-WR-TIMEZONE:${params.timezone}`,
  ];

  for (const ev of events) {
    lines.push(
      'BEGIN:VEVENT',
      foldIcsLine(`UID:${escapeIcsText(ev.uid)}`),
      `DTSTAMP:${formatUtc(dtStamp)}`,
      `DTSTART:${formatUtc(ev.start)}`,
      `DTEND:${formatUtc(ev.end)}`,
      foldIcsLine(`SUMMARY:${escapeIcsText(ev.summary)}`),
      foldIcsLine(`LOCATION:${escapeIcsText(ev.location)}`),
      foldIcsLine(`DESCRIPTION:${escapeIcsText(ev.description)}`),
      'END:VEVENT',
    );
  }

  lines.push('END:VCALENDAR');
  return lines.join('\r\n') + '\r\n';
}
