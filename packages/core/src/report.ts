// ============================================================================
// @mxqlint/core - Text Report
// ============================================================================
//
//   Query has critical issues (1 critical, 0 warnings, 1 info)
//
//   Critical Issues:
//     Line 3 [aggregate-without-grouping]: AGGREGATE applies an aggregate ...
//       -> Add a GROUP command before the aggregation
//
//   Suggestions:
//     Line 3 [unbounded-result]: ...
// ============================================================================

import type { Issue, Severity, ValidationReport } from './types.js';

const SECTIONS: { severity: Severity; title: string }[] = [
  { severity: 'critical', title: 'Critical Issues' },
  { severity: 'warning', title: 'Warnings' },
  { severity: 'info', title: 'Suggestions' },
];

export interface TextReportOptions {
  /** Wraps section titles, e.g. with terminal colors. */
  decorate?: (severity: Severity, text: string) => string;
}

function formatIssue(issue: Issue): string[] {
  const where = issue.line > 0 ? `Line ${issue.line}` : 'Query';
  const scope = issue.scope ? ` (${issue.scope})` : '';
  const lines = [`  ${where}${scope} [${issue.code}]: ${issue.message}`];
  if (issue.suggestion) lines.push(`    -> ${issue.suggestion}`);
  return lines;
}

export function summaryLine(report: ValidationReport): string {
  const { critical, warning, info } = report.summary;
  const head = report.valid ? 'Query is valid' : 'Query has critical issues';
  return `${head} (${critical} critical, ${warning} warnings, ${info} info)`;
}

/** Human-readable report grouped by severity. Always ends with a newline. */
export function formatReport(report: ValidationReport, options: TextReportOptions = {}): string {
  if (report.issues.length === 0) return 'Query is valid.\n';

  const decorate = options.decorate ?? ((_: Severity, text: string) => text);
  const out: string[] = [summaryLine(report)];

  for (const { severity, title } of SECTIONS) {
    const issues = report.issues.filter((i) => i.severity === severity);
    if (issues.length === 0) continue;
    out.push('', decorate(severity, `${title}:`));
    for (const issue of issues) out.push(...formatIssue(issue));
  }

  return `${out.join('\n')}\n`;
}
