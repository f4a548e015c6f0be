import { DateTime } from 'luxon';

import type { RegionId } from '@/lib/duty/locations';
import type { SchedulesByLocation } from '@/lib/duty/types';
import { getDefaultTimezone } from '@/lib/env';
import { logDebug } from '@/lib/log';
import { countSchedules } from '@/lib/parsing/assembler';
import { createIssueLog } from '@/lib/parsing/issues';
import { REGION_STRATEGIES } from '@/lib/parsing/strategies';
import { normalizeWhitespace } from '@/lib/parsing/text';
import type { ParseContext, ParseIssue } from '@/lib/parsing/types';
import type { YearDetectionResult } from '@/lib/parsing/yearDetection';

export type ParseBulletinParams = {
  regionId: RegionId;
  /** Extracted text of each page, in page order. */
  pages: readonly string[];
  sourceUrl?: string | null;
  /** Overrides the strategy's own starting year. */
  seedYear?: number | null;
  now?: Date;
};

export type ParseBulletinResult =
  | {
      status: 'ok';
      regionId: RegionId;
      schedules: SchedulesByLocation;
      yearDetection: YearDetectionResult | null;
      issues: ParseIssue[];
    }
  | {
      status: 'empty';
      regionId: RegionId;
      reason: 'no-text' | 'no-schedules';
      yearDetection: YearDetectionResult | null;
      issues: ParseIssue[];
    };

/**
 * Turns a bulletin's page texts into schedules per location. Bad lines and
 * pages are reported in `issues`; only a bulletin that yields nothing comes
 * back as `empty`.
 */
export function parseBulletin(params: ParseBulletinParams): ParseBulletinResult {
  const { regionId } = params;
  const log = createIssueLog(`parser:${regionId}`);

  if (params.pages.every((page) => normalizeWhitespace(page).length === 0)) {
    return {
      status: 'empty',
      regionId,
      reason: 'no-text',
      yearDetection: null,
      issues: log.issues,
    };
  }

  const now = params.now ?? new Date();
  const context: ParseContext = {
    sourceUrl: params.sourceUrl ?? null,
    seedYear: params.seedYear ?? null,
    now,
    currentYear: DateTime.fromJSDate(now, { zone: getDefaultTimezone() }).year,
    report: log.report,
  };

  let schedules: SchedulesByLocation = {};
  let yearDetection: YearDetectionResult | null = null;
  try {
    const result = REGION_STRATEGIES[regionId].parse(params.pages, context);
    schedules = result.schedules;
    yearDetection = result.yearDetection;
  } catch (err) {
    log.report({
      kind: 'page-failed',
      page: null,
      detail: err instanceof Error ? err.message : String(err),
    });
  }

  const total = countSchedules(schedules);
  logDebug(
    `parser:${regionId}`,
    `${total} schedules across ${Object.keys(schedules).length} locations, ${log.issues.length} issues`,
  );

  if (total === 0) {
    return {
      status: 'empty',
      regionId,
      reason: 'no-schedules',
      yearDetection,
      issues: log.issues,
    };
  }
  return { status: 'ok', regionId, schedules, yearDetection, issues: log.issues };
}
