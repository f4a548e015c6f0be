import type { DutyTimeSpan } from '@/lib/duty/timeSpans';
import type {
  DutyDate,
  Pharmacy,
  SchedulesByLocation,
} from '@/lib/duty/types';
import type { YearDetectionResult } from '@/lib/parsing/yearDetection';

/** A single "pharmacy X is on duty at location L on date D for span S" reading. */
export type DutyFact = {
  locationId: string;
  date: DutyDate;
  span: DutyTimeSpan;
  pharmacy: Pharmacy;
};

export type ParseIssueKind =
  | 'unrecognized-line'
  | 'incomplete-line'
  | 'unresolvable-date'
  | 'derivation-skipped'
  | 'page-failed'
  | 'year-detection';

export type ParseIssue = {
  kind: ParseIssueKind;
  /** 1-based page number, null for document-level issues. */
  page: number | null;
  detail: string;
};

export type ParseContext = {
  sourceUrl: string | null;
  seedYear: number | null;
  now: Date;
  currentYear: number;
  report: (issue: ParseIssue) => void;
};

export type StrategyResult = {
  schedules: SchedulesByLocation;
  yearDetection: YearDetectionResult | null;
};

export type StrategyKind =
  | 'simple-table'
  | 'composite-table'
  | 'columnar'
  | 'multi-zone';

export type RegionStrategy = {
  kind: StrategyKind;
  parse: (pages: readonly string[], context: ParseContext) => StrategyResult;
};

export type LineStep<S> = { state: S; facts: DutyFact[] };
