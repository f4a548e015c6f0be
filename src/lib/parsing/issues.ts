import { logDebug, logWarn } from '@/lib/log';
import type { ParseIssue, ParseIssueKind } from '@/lib/parsing/types';

export type IssueLog = {
  issues: ParseIssue[];
  report: (issue: ParseIssue) => void;
};

export function formatIssue(issue: ParseIssue): string {
  const where = issue.page === null ? '' : ` (page ${issue.page})`;
  return `${issue.kind}${where}: ${issue.detail}`;
}

export function createIssueLog(scope: string): IssueLog {
  const issues: ParseIssue[] = [];
  return {
    issues,
    report(issue) {
      issues.push(issue);
      // Headers and legends produce many unrecognized lines.
      if (issue.kind === 'unrecognized-line') {
        logDebug(scope, formatIssue(issue));
      } else {
        logWarn(scope, formatIssue(issue));
      }
    },
  };
}

export type PageReporter = (kind: ParseIssueKind, detail: string) => void;

export function pageReporter(
  report: (issue: ParseIssue) => void,
  page: number | null,
): PageReporter {
  return (kind, detail) => report({ kind, page, detail });
}
