// ============================================================================
// @mxqlint/core - Issue Aggregation
// ============================================================================
//
// Merges issue lists from every pass into one deterministic report order:
// command index, then severity (critical > warning > info), then insertion.
// ============================================================================

import type {
  Command,
  Issue,
  IssueCategory,
  Severity,
  SeveritySummary,
  ValidationReport,
} from './types.js';

export const SEVERITY_RANK: Record<Severity, number> = {
  critical: 0,
  warning: 1,
  info: 2,
};

/** Issue located at a command. */
export function commandIssue(
  command: Command,
  severity: Severity,
  category: IssueCategory,
  code: string,
  message: string,
  suggestion?: string,
): Issue {
  const issue: Issue = {
    severity,
    category,
    code,
    message,
    commandIndex: command.index,
    line: command.line,
    scope: command.scope,
  };
  if (suggestion !== undefined) issue.suggestion = suggestion;
  return issue;
}

/** Issue about the query as a whole. */
export function queryIssue(
  severity: Severity,
  category: IssueCategory,
  code: string,
  message: string,
  suggestion?: string,
): Issue {
  const issue: Issue = {
    severity,
    category,
    code,
    message,
    commandIndex: -1,
    line: 0,
    scope: null,
  };
  if (suggestion !== undefined) issue.suggestion = suggestion;
  return issue;
}

export interface AggregateOptions {
  /** Issue codes dropped from the result. */
  disabledRules?: readonly string[];
}

/**
 * Merge, deduplicate and order issues.
 * Duplicates share command index, code and message; the first one is kept.
 */
export function aggregateIssues(lists: readonly Issue[][], options: AggregateOptions = {}): Issue[] {
  const disabled = new Set(options.disabledRules ?? []);
  const seen = new Set<string>();
  const merged: { issue: Issue; order: number }[] = [];

  for (const list of lists) {
    for (const issue of list) {
      if (disabled.has(issue.code)) continue;
      const key = `${issue.commandIndex}\u0000${issue.code}\u0000${issue.message}`;
      if (seen.has(key)) continue;
      seen.add(key);
      merged.push({ issue, order: merged.length });
    }
  }

  merged.sort(
    (a, b) =>
      a.issue.commandIndex - b.issue.commandIndex ||
      SEVERITY_RANK[a.issue.severity] - SEVERITY_RANK[b.issue.severity] ||
      a.order - b.order,
  );

  return merged.map((m) => m.issue);
}

export function summarize(issues: readonly Issue[]): SeveritySummary {
  const summary: SeveritySummary = { critical: 0, warning: 0, info: 0 };
  for (const issue of issues) {
    summary[issue.severity]++;
  }
  return summary;
}

/** A query is valid when no critical issue remains. */
export function buildReport(issues: Issue[], commandCount: number): ValidationReport {
  const summary = summarize(issues);
  return {
    valid: summary.critical === 0,
    issues,
    summary,
    commandCount,
  };
}
