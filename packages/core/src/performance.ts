// ============================================================================
// @mxqlint/core - Performance Heuristics
// ============================================================================
//
// Advisory checks only: Warning or Info, never Critical.
//
//   late-filter           filter after a grouping command
//   wildcard-projection   projection of '*'
//   unbounded-result      top-level query with no bound and no aggregation
//   excessive-granularity time range / bucket above the configured ratio
//   combine-aggregations  same target aggregated with different functions
// ============================================================================

import type { ParsedDocument } from './assembler.js';
import { scopesOf } from './assembler.js';
import { aggregateFunction, referencedFields, timeBucket } from './command_info.js';
import { formatDuration, parseDuration } from './duration.js';
import { commandIssue } from './issues.js';
import type { Command, Issue, Query } from './types.js';
import { asNumber, asTextList, getProperty } from './value.js';

export const DEFAULT_GRANULARITY_RATIO = 500;

export interface PerformanceOptions {
  /** Fallback time range when the query declares none. */
  timeRangeMs?: number;
  granularityRatio?: number;
}

/**
 * Time range a scope covers: a time-range command, then loader
 * `stime`/`etime`, then the caller's fallback.
 */
export function detectTimeRange(query: Query, fallbackMs?: number): number | undefined {
  for (const command of query.commands) {
    if (command.spec?.role !== 'time-range') continue;
    const ms = parseDuration(command.payload);
    if (ms !== undefined) return ms;
  }
  for (const command of query.commands) {
    if (command.spec?.role !== 'loader') continue;
    const stime = asNumber(getProperty(command.payload, 'stime'));
    const etime = asNumber(getProperty(command.payload, 'etime'));
    if (stime !== undefined && etime !== undefined && etime > stime) return etime - stime;
  }
  return fallbackMs;
}

function checkScope(query: Query, rangeMs: number | undefined, ratio: number, issues: Issue[]): void {
  let grouped = false;
  const functionsByTarget = new Map<string, Set<string>>();

  for (const command of query.commands) {
    switch (command.spec?.role) {
      case 'filter':
        if (grouped) {
          issues.push(
            commandIssue(
              command,
              'warning',
              'performance',
              'late-filter',
              `${command.name} after grouping processes a larger-than-necessary dataset`,
              'Move the filter before the grouping command',
            ),
          );
        }
        break;

      case 'projection':
        if (asTextList(command.payload).includes('*')) {
          issues.push(
            commandIssue(
              command,
              'warning',
              'performance',
              'wildcard-projection',
              `${command.name} projects every field with '*'`,
              'List only the fields the query needs',
            ),
          );
        }
        break;

      case 'group': {
        grouped = true;
        const bucket = timeBucket(command);
        const bucketMs = parseDuration(bucket);
        if (bucketMs === undefined || rangeMs === undefined) break;
        const buckets = rangeMs / bucketMs;
        if (buckets > ratio) {
          issues.push(
            commandIssue(
              command,
              'warning',
              'performance',
              'excessive-granularity',
              `${command.name} time bucket ${formatDuration(bucketMs)} over a ${formatDuration(rangeMs)} range yields ${Math.ceil(buckets)} buckets (limit ${ratio})`,
              `Use a bucket of at least ${formatDuration(Math.ceil(rangeMs / ratio / 1000) * 1000)}`,
            ),
          );
        }
        break;
      }

      case 'aggregate': {
        const fn = aggregateFunction(command);
        if (fn === undefined) break;
        for (const target of referencedFields(command)) {
          const seen = functionsByTarget.get(target);
          if (!seen) {
            functionsByTarget.set(target, new Set([fn]));
            continue;
          }
          if (!seen.has(fn)) {
            issues.push(
              commandIssue(
                command,
                'info',
                'performance',
                'combine-aggregations',
                `'${target}' is aggregated again with ${fn} (already ${[...seen].join(', ')})`,
                'Combine aggregations of the same field into one command',
              ),
            );
            seen.add(fn);
          }
        }
        break;
      }

      default:
        break;
    }
  }
}

function checkUnbounded(root: Query, issues: Issue[]): void {
  const stages: Command[] = root.commands.filter(
    (c) => c.spec?.role !== 'block-open' && c.spec?.role !== 'block-close',
  );
  if (stages.length === 0) return;
  const bounded = stages.some((c) => {
    const role = c.spec?.role;
    return role === 'bound' || role === 'group' || role === 'aggregate';
  });
  if (bounded) return;
  issues.push(
    commandIssue(
      stages[stages.length - 1],
      'info',
      'performance',
      'unbounded-result',
      'Query returns every row: no bound and no aggregation',
      'Add a bounding command (LIMIT / BOUND) or aggregate the result',
    ),
  );
}

export function checkPerformance(doc: ParsedDocument, options: PerformanceOptions = {}): Issue[] {
  const issues: Issue[] = [];
  const ratio = options.granularityRatio ?? DEFAULT_GRANULARITY_RATIO;
  const rootRange = detectTimeRange(doc.root, options.timeRangeMs);

  for (const scope of scopesOf(doc)) {
    const range = scope === doc.root ? rootRange : detectTimeRange(scope, rootRange);
    checkScope(scope, range, ratio, issues);
  }
  checkUnbounded(doc.root, issues);
  return issues;
}
