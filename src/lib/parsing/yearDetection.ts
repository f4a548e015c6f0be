import { DateTime } from 'luxon';

import { getDefaultTimezone } from '@/lib/env';
import { normalizeWhitespace } from '@/lib/parsing/text';

export type YearDetectionSource =
  | 'url'
  | 'pdf'
  | 'flexible'
  | 'fallback-december'
  | 'fallback-current';

export type YearDetectionResult = {
  year: number;
  source: YearDetectionSource;
  /** False when no layer produced a plausible year; callers should not cache. */
  isValid: boolean;
  warning: string | null;
  /** Year chosen before the December adjustment. */
  detectedYear: number;
  decemberAdjusted: boolean;
};

const URL_YEAR_WINDOW = 20;
const MAX_YEAR_DISTANCE = 2;
const DECEMBER_SCAN_CHARS = 500;

const URL_YEAR_REGEX = /(?<!\d)(\d{4})(?!\d)/g;
const STRICT_YEAR_REGEX = /\b(20[2-3]\d)(?:\s*-\s*20[2-3]\d)?\b/;
const FLEXIBLE_YEAR_REGEX = /2\D?0\D?([2-3])\D?(\d)/;
const DECEMBER_DATE_REGEX = /(?<!\d)\d{1,2}[\u2010\u2011-]dic\b/i;

type LayerSource = Extract<YearDetectionSource, 'url' | 'pdf' | 'flexible'>;

type Validation = { isValid: boolean; warning: string | null };

// The rightmost year wins: a filename year overrides an upload-folder year.
function yearFromUrl(url: string, currentYear: number): number | null {
  const years = [...url.matchAll(URL_YEAR_REGEX)]
    .map((match) => Number(match[1]))
    .reverse();
  return (
    years.find((year) => Math.abs(year - currentYear) <= URL_YEAR_WINDOW) ??
    null
  );
}

function yearFromStrictText(text: string): number | null {
  const match = text.match(STRICT_YEAR_REGEX);
  return match ? Number(match[1]) : null;
}

function yearFromFlexibleText(text: string): number | null {
  const match = text.match(FLEXIBLE_YEAR_REGEX);
  return match ? Number(`20${match[1]}${match[2]}`) : null;
}

function validateYear(year: number, currentYear: number): Validation {
  const distance = Math.abs(year - currentYear);
  if (distance > MAX_YEAR_DISTANCE) {
    return {
      isValid: false,
      warning: `Year ${year} is more than ${MAX_YEAR_DISTANCE} years away from ${currentYear}.`,
    };
  }
  if (distance === MAX_YEAR_DISTANCE) {
    return {
      isValid: true,
      warning: `Year ${year} is ${MAX_YEAR_DISTANCE} years away from ${currentYear}; check the bulletin.`,
    };
  }
  return { isValid: true, warning: null };
}

function joinWarnings(...warnings: Array<string | null>): string | null {
  const present = warnings.filter((w): w is string => w !== null);
  return present.length > 0 ? present.join(' ') : null;
}

export function hasLeadingDecemberDates(text: string): boolean {
  // The window is measured on the page text as extracted.
  return DECEMBER_DATE_REGEX.test(
    normalizeWhitespace(text.slice(0, DECEMBER_SCAN_CHARS)),
  );
}

/**
 * Resolves the base year of a bulletin from its URL, then its text, then the
 * clock. A bulletin that opens with December dates belongs to the cycle that
 * started the year before, so the chosen year is then decremented.
 */
export function detectYear(params: {
  text: string;
  sourceUrl?: string | null;
  now?: Date;
}): YearDetectionResult {
  const currentYear = DateTime.fromJSDate(params.now ?? new Date(), {
    zone: getDefaultTimezone(),
  }).year;
  const text = normalizeWhitespace(params.text);
  const sourceUrl = params.sourceUrl ?? null;

  const layers: Array<{ source: LayerSource; find: () => number | null }> = [
    {
      source: 'url',
      find: () => (sourceUrl ? yearFromUrl(sourceUrl, currentYear) : null),
    },
    { source: 'pdf', find: () => yearFromStrictText(text) },
    { source: 'flexible', find: () => yearFromFlexibleText(text) },
  ];

  const rejected: string[] = [];
  let chosen: {
    year: number;
    source: YearDetectionSource;
    isValid: boolean;
    warning: string | null;
  } | null = null;

  for (const layer of layers) {
    const year = layer.find();
    if (year === null) continue;
    const validation = validateYear(year, currentYear);
    if (!validation.isValid) {
      rejected.push(`Ignored ${layer.source} year: ${validation.warning}`);
      continue;
    }
    chosen = { year, source: layer.source, ...validation };
    break;
  }

  if (!chosen) {
    chosen = {
      year: currentYear,
      source: 'fallback-current',
      isValid: false,
      warning: joinWarnings(
        ...rejected,
        `No year found in the source URL or document text; using current year ${currentYear}.`,
      ),
    };
  }

  if (!hasLeadingDecemberDates(text)) {
    return { ...chosen, detectedYear: chosen.year, decemberAdjusted: false };
  }

  const adjusted = chosen.year - 1;
  return {
    year: adjusted,
    source:
      chosen.source === 'fallback-current' ? 'fallback-december' : chosen.source,
    isValid: chosen.isValid,
    warning: joinWarnings(
      chosen.warning,
      `Found year ${chosen.year}, but adjusted to ${adjusted} due to December dates at start of schedule.`,
    ),
    detectedYear: chosen.year,
    decemberAdjusted: true,
  };
}
