import { splitPageLines } from '@/lib/parsing/text';
import type { DutyFact, LineStep, ParseContext } from '@/lib/parsing/types';

/** Left fold of `(state, line) -> (state, facts)` over one page's lines. */
export function foldLines<S>(
  lines: readonly string[],
  initial: S,
  step: (state: S, line: string) => LineStep<S>,
): LineStep<S> {
  let state = initial;
  const facts: DutyFact[] = [];
  for (const line of lines) {
    const next = step(state, line);
    state = next.state;
    facts.push(...next.facts);
  }
  return { state, facts };
}

/**
 * Runs `parsePage` over pages in order. A page that throws is reported and
 * skipped; the state carried into the next page is the one from before it.
 */
export function foldPages<S>(
  pages: readonly string[],
  initial: S,
  parsePage: (state: S, lines: string[], page: number) => LineStep<S>,
  context: Pick<ParseContext, 'report'>,
): LineStep<S> {
  let state = initial;
  const facts: DutyFact[] = [];
  pages.forEach((pageText, index) => {
    const page = index + 1;
    try {
      const result = parsePage(state, splitPageLines(pageText), page);
      state = result.state;
      facts.push(...result.facts);
    } catch (err) {
      context.report({
        kind: 'page-failed',
        page,
        detail: err instanceof Error ? err.message : String(err),
      });
    }
  });
  return { state, facts };
}
