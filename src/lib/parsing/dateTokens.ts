import {
  MONTH_ABBREVIATIONS,
  makeDutyDate,
  monthFromAbbreviation,
  monthFromName,
  monthNumber,
  type SpanishMonth,
} from '@/lib/duty/dates';
import type { DutyDate } from '@/lib/duty/types';

export type DateToken = {
  day: number;
  month: SpanishMonth;
  /** Position in the line, used to keep mixed notations in textual order. */
  index: number;
  raw: string;
};

export type DatedToken = DateToken & { year: number };

export type TokenScan<T> = {
  tokens: T[];
  /** Matched text that could not be turned into a date. */
  rejected: string[];
};

const REGULAR_DATE_REGEX = /(?<!\d)(\d{1,2})[\u2010\u2011-]([a-zñ]{3})/gi;

const TRANSITION_DATE_REGEX =
  /\b(DOMINGO|LUNES|MARTES|MI[EÉ]RCOLES|JUEVES|VIERNES|S[AÁ]BADO)\s+(\d{1,2})\s+DE\s+(AGOSTO|SEPTIEMBRE)\b/gi;

const TWO_DIGIT_YEAR_DATE_REGEX =
  /(?<!\d)(\d{1,2})[\u2010\u2011-](ene|feb|mar|abr|may|jun|jul|ago|sep|oct|nov|dic)[\u2010\u2011-](\d{2})(?!\d)/gi;

const SINGLE_TOKEN_REGEX = /^(\d{1,2})[\u2010\u2011-]([a-zñ]{3})$/i;

// Two-digit years further than this from the base year are treated as typos.
const MAX_YEAR_DRIFT = 1;

function isValidDay(day: number): boolean {
  return Number.isInteger(day) && day >= 1 && day <= 31;
}

export function toRegularToken(day: number, month: SpanishMonth): string {
  const abbr = MONTH_ABBREVIATIONS[monthNumber(month) - 1];
  return `${String(day).padStart(2, '0')}-${abbr}`;
}

export function scanRegularDates(line: string): TokenScan<DateToken> {
  const tokens: DateToken[] = [];
  const rejected: string[] = [];
  for (const match of line.matchAll(REGULAR_DATE_REGEX)) {
    const day = Number(match[1]);
    const month = monthFromAbbreviation(match[2]);
    if (!month || !isValidDay(day)) {
      rejected.push(match[0]);
      continue;
    }
    tokens.push({ day, month, index: match.index ?? 0, raw: match[0] });
  }
  return { tokens, rejected };
}

/**
 * Reads the August/September hand-over sentence
 * ("DOMINGO 31 DE AGOSTO Y LUNES 1 DE SEPTIEMBRE") as `dd-mmm` tokens.
 */
export function scanTransitionDates(line: string): TokenScan<DateToken> {
  const tokens: DateToken[] = [];
  const rejected: string[] = [];
  for (const match of line.matchAll(TRANSITION_DATE_REGEX)) {
    const day = Number(match[2]);
    const month = monthFromName(match[3]);
    if (!month || !isValidDay(day)) {
      rejected.push(match[0]);
      continue;
    }
    tokens.push({
      day,
      month,
      index: match.index ?? 0,
      raw: toRegularToken(day, month),
    });
  }
  return { tokens, rejected };
}

export function scanLineDates(
  line: string,
  options: { transitional: boolean },
): TokenScan<DateToken> {
  const regular = scanRegularDates(line);
  if (!options.transitional) return regular;
  const transition = scanTransitionDates(line);
  return {
    tokens: [...regular.tokens, ...transition.tokens].sort(
      (a, b) => a.index - b.index,
    ),
    rejected: [...regular.rejected, ...transition.rejected],
  };
}

export function expandTwoDigitYear(yy: number, baseYear: number): number {
  const baseLastTwo = baseYear % 100;
  if (yy === baseLastTwo) return baseYear;
  if (yy < baseLastTwo) return baseYear - (baseLastTwo - yy);
  return baseYear + (yy - baseLastTwo);
}

export function scanTwoDigitYearDates(
  line: string,
  baseYear: number,
): TokenScan<DatedToken> {
  const tokens: DatedToken[] = [];
  const rejected: string[] = [];
  for (const match of line.matchAll(TWO_DIGIT_YEAR_DATE_REGEX)) {
    const day = Number(match[1]);
    const month = monthFromAbbreviation(match[2]);
    const year = expandTwoDigitYear(Number(match[3]), baseYear);
    if (
      !month ||
      !isValidDay(day) ||
      Math.abs(year - baseYear) > MAX_YEAR_DRIFT
    ) {
      rejected.push(match[0]);
      continue;
    }
    tokens.push({ day, month, year, index: match.index ?? 0, raw: match[0] });
  }
  return { tokens, rejected };
}

export function isNewYearToken(token: Pick<DateToken, 'day' | 'month'>): boolean {
  return token.day === 1 && token.month === 'enero';
}

/**
 * Assigns years to tokens in scan order. Every `01-ene` bumps the running
 * year before it is assigned, so the token itself opens the new year.
 */
export function applyYearCounter(
  year: number,
  tokens: readonly DateToken[],
): { year: number; dated: DatedToken[] } {
  let current = year;
  const dated = tokens.map((token) => {
    if (isNewYearToken(token)) current += 1;
    return { ...token, year: current };
  });
  return { year: current, dated };
}

export function toDutyDate(token: DatedToken): DutyDate {
  return makeDutyDate({ day: token.day, month: token.month, year: token.year });
}

/** Resolves a lone `dd-mmm` token against a fixed year. */
export function parseRegularToken(raw: string, year: number): DutyDate | null {
  const match = raw.trim().match(SINGLE_TOKEN_REGEX);
  if (!match) return null;
  const day = Number(match[1]);
  const month = monthFromAbbreviation(match[2]);
  if (!month || !isValidDay(day)) return null;
  return makeDutyDate({ day, month, year });
}
