import type { ParseContext } from '@/lib/parsing/types';
import {
  detectYear,
  type YearDetectionResult,
} from '@/lib/parsing/yearDetection';

/**
 * Year to start a document at: the caller's seed when given, otherwise the
 * year detected from the first page and the source URL.
 */
export function resolveBaseYear(
  pages: readonly string[],
  context: ParseContext,
): { year: number; yearDetection: YearDetectionResult | null } {
  if (context.seedYear !== null) {
    return { year: context.seedYear, yearDetection: null };
  }

  const yearDetection = detectYear({
    text: pages[0] ?? '',
    sourceUrl: context.sourceUrl,
    now: context.now,
  });
  if (yearDetection.warning) {
    context.report({
      kind: 'year-detection',
      page: null,
      detail: yearDetection.warning,
    });
  }
  return { year: yearDetection.year, yearDetection };
}
