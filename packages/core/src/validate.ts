// ============================================================================
// @mxqlint/core - Validation Entry Points
// ============================================================================
//
// One call = one parse, four independent passes, one aggregation. Nothing
// is shared between calls, so validations may run concurrently.
// ============================================================================

import { type ParsedDocument, parseQuery } from './assembler.js';
import { type Dialect, type DialectName, getDialect } from './dialect.js';
import { QueryInputError } from './errors.js';
import { checkFields } from './field_check.js';
import { aggregateIssues, buildReport } from './issues.js';
import { logValidation, timer } from './logger.js';
import { checkPerformance } from './performance.js';
import { checkSemantics } from './semantic_rules.js';
import { checkStructure } from './structural.js';
import { checkStyle } from './style.js';
import type { CategoryLookup, ValidationReport } from './types.js';

export interface AnalyzeOptions {
  /** Dialect name or definition. Default `mxql`. */
  dialect?: DialectName | Dialect;
  /** Enables unknown-field checks against category metadata. */
  categoryLookup?: CategoryLookup;
  /** Time range used for granularity checks when the query declares none. */
  timeRangeMs?: number;
  /** Maximum time buckets per range before warning. Default 500. */
  granularityRatio?: number;
  /** Issue codes removed from the report. */
  disabledRules?: readonly string[];
}

export interface Analysis {
  document: ParsedDocument;
  report: ValidationReport;
}

export function resolveDialect(dialect: DialectName | Dialect | undefined): Dialect {
  if (dialect === undefined) return getDialect('mxql');
  return typeof dialect === 'string' ? getDialect(dialect) : dialect;
}

/**
 * Parse and validate one query, returning the parsed document alongside
 * the report.
 *
 * @throws {QueryInputError} when `text` is not a string
 */
export function analyzeQuery(text: string, options: AnalyzeOptions = {}): Analysis {
  if (typeof text !== 'string') throw new QueryInputError(text);
  const dialect = resolveDialect(options.dialect);
  const total = timer('validate');

  const parseTimer = timer('parse');
  const document = parseQuery(text, dialect);
  parseTimer.endWith({ commands: document.commands.length });

  const passTimer = timer('passes');
  const issues = aggregateIssues(
    [
      checkStructure(document),
      checkSemantics(document),
      checkFields(document, options.categoryLookup),
      checkPerformance(document, {
        timeRangeMs: options.timeRangeMs,
        granularityRatio: options.granularityRatio,
      }),
      checkStyle(document),
    ],
    { disabledRules: options.disabledRules },
  );
  passTimer.end();

  const report = buildReport(issues, document.commands.length);
  logValidation(report.commandCount, report.issues.length, report.valid, total.end());
  return { document, report };
}

/**
 * Validate one query.
 *
 * @example
 * ```ts
 * const report = validateQuery('SOURCE db_x\nLOAD\nAGGREGATE {target: cpu, fn: avg}', { dialect: 'pipeline' });
 * report.valid;            // false
 * report.issues[0].code;   // 'aggregate-without-grouping'
 * ```
 */
export function validateQuery(text: string, options: AnalyzeOptions = {}): ValidationReport {
  return analyzeQuery(text, options).report;
}

/** Validate independent queries; reports are returned in input order. */
export function validateMany(texts: readonly string[], options: AnalyzeOptions = {}): ValidationReport[] {
  return texts.map((text) => validateQuery(text, options));
}
