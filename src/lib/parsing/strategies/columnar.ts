import {
  SPANISH_MONTHS,
  dutyDateKey,
  makeDutyDate,
  monthFromName,
} from '@/lib/duty/dates';
import { DUTY_TIME_SPANS } from '@/lib/duty/timeSpans';
import type { DutyDate, Pharmacy } from '@/lib/duty/types';
import { assembleSchedules } from '@/lib/parsing/assembler';
import { isNewYearToken } from '@/lib/parsing/dateTokens';
import { foldPages } from '@/lib/parsing/fold';
import { pageReporter } from '@/lib/parsing/issues';
import type { DutyFact, RegionStrategy } from '@/lib/parsing/types';

const LOCATION_ID = 'segovia-capital';

// A row is printed as three lines: names, date + addresses, phones.
const BAND_SIZE = 3;
const MIN_BLOCK_LINES = 3;

const WEEKDAYS = '(?:lunes|martes|mi[eé]rcoles|jueves|viernes|s[aá]bado|domingo)';
const MONTHS = `(?:${SPANISH_MONTHS.join('|')})`;

const SPANISH_DATE_REGEX = new RegExp(
  `(${WEEKDAYS}),\\s*(\\d{1,2})\\s*de\\s*(${MONTHS})`,
  'i',
);
const DATE_PREFIX = `^${WEEKDAYS},\\s*\\d{1,2}\\s*de\\s*${MONTHS}\\s+`;
const NIGHT_ADDRESS = `(.+?)(?:,\\s*)?(\\d+|S/N)$`;

// Street names may contain numbers ("C/ 18 de Julio, 4"), so a day address
// ending in ", N" is preferred over one ending in a bare number.
const ADDRESS_PAIR_REGEXES = [
  new RegExp(`${DATE_PREFIX}(.+?),\\s*(\\d+|S/N)\\s+${NIGHT_ADDRESS}`, 'i'),
  new RegExp(`${DATE_PREFIX}(.+?)(\\d+|S/N)\\s+${NIGHT_ADDRESS}`, 'i'),
];
const NAME_PAIR_REGEX = /^(FARMACIA.*\S)\s+(FARMACIA.*)$/;
const PHONE_INFO_REGEX = /(?:(\([^)]+\))\s*)?Tfno:\s*(\d{3}\s*\d{6})/g;
const PHONE_REGEX = /Tfno:\s*(\d{3}\s*\d{6})/;

const NO_PHONE = 'No disponible';

type BandDate = { dayOfWeek: string; day: number; month: DutyDate['month'] };

type BandRow = {
  date: BandDate;
  day: string[];
  night: string[];
};

type ColumnarState = {
  year: number;
  dates: DutyDate[];
  dayBlocks: string[][];
  nightBlocks: string[][];
};

function formatAddress(street: string, number: string): string {
  const trimmed = street.trim();
  return number.toUpperCase() === 'S/N' ? `${trimmed} S/N` : `${trimmed}, ${number}`;
}

function nonEmpty(values: Array<string | null>): string[] {
  return values
    .map((value) => value?.trim() ?? '')
    .filter((value) => value.length > 0);
}

function readBandDate(line: string): BandDate | null {
  const match = line.match(SPANISH_DATE_REGEX);
  if (!match) return null;
  const month = monthFromName(match[3]);
  const day = Number(match[2]);
  if (!month || day < 1 || day > 31) return null;
  return { dayOfWeek: match[1].toLowerCase(), day, month };
}

function matchAddressPair(line: string): RegExpMatchArray | null {
  for (const regex of ADDRESS_PAIR_REGEXES) {
    const match = line.match(regex);
    if (match) return match;
  }
  return null;
}

/** Splits one three-line band into its day and night column blocks. */
export function readBand(band: readonly string[]): BandRow | null {
  if (band.length < BAND_SIZE) return null;
  const [namesLine, dateLine, phonesLine] = band;

  const date = readBandDate(dateLine);
  if (!date) return null;

  const names = namesLine.match(NAME_PAIR_REGEX);
  const addresses = matchAddressPair(dateLine);
  const phones = [...phonesLine.matchAll(PHONE_INFO_REGEX)].map(
    (match) => match[0],
  );

  const day = nonEmpty([
    names ? names[1] : null,
    addresses ? formatAddress(addresses[1], addresses[2]) : null,
    phones.length > 0 ? phones[0] : null,
  ]);
  const night = nonEmpty([
    names ? names[2] : null,
    addresses ? formatAddress(addresses[3], addresses[4]) : null,
    phones.length > 1 ? phones[1] : null,
  ]);

  if (day.length < MIN_BLOCK_LINES || night.length < MIN_BLOCK_LINES) {
    return null;
  }
  return { date, day, night };
}

/** Builds a pharmacy from a `[name, address, phone info]` block. */
export function parseColumnBlock(block: readonly string[]): Pharmacy | null {
  if (block.length < MIN_BLOCK_LINES) return null;
  const [name, address, info] = block;
  const phoneMatch = info.match(PHONE_REGEX);
  const phone = phoneMatch ? phoneMatch[1].replace(/\s+/g, ' ') : NO_PHONE;
  const additionalInfo = info.replace(PHONE_REGEX, '').trim();
  return additionalInfo.length > 0
    ? { name, address, phone, additionalInfo }
    : { name, address, phone };
}

/** Pairs the Nth date with the Nth day and night blocks, skipping repeated dates. */
export function zipColumns(
  state: Pick<ColumnarState, 'dates' | 'dayBlocks' | 'nightBlocks'>,
): DutyFact[] {
  const count = Math.min(
    state.dates.length,
    state.dayBlocks.length,
    state.nightBlocks.length,
  );
  const seen = new Set<string>();
  const facts: DutyFact[] = [];

  for (let i = 0; i < count; i++) {
    const date = state.dates[i];
    const key = dutyDateKey(date);
    if (seen.has(key)) continue;
    seen.add(key);

    const dayPharmacy = parseColumnBlock(state.dayBlocks[i]);
    const nightPharmacy = parseColumnBlock(state.nightBlocks[i]);
    if (dayPharmacy) {
      facts.push({
        locationId: LOCATION_ID,
        date,
        span: DUTY_TIME_SPANS['capital-day'],
        pharmacy: dayPharmacy,
      });
    }
    if (nightPharmacy) {
      facts.push({
        locationId: LOCATION_ID,
        date,
        span: DUTY_TIME_SPANS['capital-night'],
        pharmacy: nightPharmacy,
      });
    }
  }
  return facts;
}

// Segovia Capital: day and night columns side by side, one row per date.
export const columnarStrategy: RegionStrategy = {
  kind: 'columnar',
  parse(pages, context) {
    const initial: ColumnarState = {
      year: context.seedYear ?? context.currentYear - 1,
      dates: [],
      dayBlocks: [],
      nightBlocks: [],
    };

    const scanned = foldPages(
      pages,
      initial,
      (state, lines, page) => {
        const report = pageReporter(context.report, page);
        let year = state.year;
        const dates = [...state.dates];
        const dayBlocks = [...state.dayBlocks];
        const nightBlocks = [...state.nightBlocks];

        let index = 0;
        while (index < lines.length) {
          const row = readBand(lines.slice(index, index + BAND_SIZE));
          if (!row) {
            report('unrecognized-line', lines[index]);
            index += 1;
            continue;
          }
          if (isNewYearToken(row.date)) year += 1;
          dates.push(makeDutyDate({ ...row.date, year }));
          dayBlocks.push(row.day);
          nightBlocks.push(row.night);
          index += BAND_SIZE;
        }

        return { state: { year, dates, dayBlocks, nightBlocks }, facts: [] };
      },
      context,
    );

    const facts = zipColumns(scanned.state);
    return {
      schedules: assembleSchedules(facts, {
        currentYear: context.currentYear,
        locationIds: [LOCATION_ID],
      }),
      yearDetection: null,
    };
  },
};
