import { describe, expect, it } from 'vitest';
import { parseQuery } from '../assembler.js';
import { getDialect } from '../dialect.js';
import { checkPerformance, detectTimeRange } from '../performance.js';

const pipeline = getDialect('pipeline');
const mxql = getDialect('mxql');

describe('checkPerformance', () => {
  it('warns about a filter after grouping', () => {
    const doc = parseQuery('SOURCE x\nLOAD\nGROUP {by: host}\nFILTER {key: cpu, cmp: gt, value: 1}', pipeline);
    const issues = checkPerformance(doc);
    expect(issues.map((i) => [i.code, i.severity, i.commandIndex])).toEqual([['late-filter', 'warning', 3]]);
  });

  it('warns about a wildcard projection and notes an unbounded result', () => {
    const issues = checkPerformance(parseQuery('SOURCE x\nLOAD\nPROJECT [*]', pipeline));
    expect(issues.map((i) => [i.code, i.severity, i.commandIndex])).toEqual([
      ['wildcard-projection', 'warning', 2],
      ['unbounded-result', 'info', 2],
    ]);
  });

  it('does not note an unbounded result when the query bounds or aggregates', () => {
    expect(checkPerformance(parseQuery('SOURCE x\nLOAD\nBOUND 5', pipeline))).toEqual([]);
    expect(checkPerformance(parseQuery('SOURCE x\nLOAD\nGROUP {by: h}', pipeline))).toEqual([]);
  });

  it('checks unbounded results on the top-level scope only', () => {
    const text = 'BLOCK a\nROW {x: 1}\nEND\nSOURCE s\nLOAD\nUSE a\nBOUND 5';
    expect(checkPerformance(parseQuery(text, pipeline))).toEqual([]);
  });

  describe('granularity', () => {
    it('warns when a declared range has too many buckets', () => {
      const doc = parseQuery('SOURCE x\nRANGE 1d\nLOAD\nGROUP {interval: 1m}', pipeline);
      const issues = checkPerformance(doc);
      expect(issues).toHaveLength(1);
      expect(issues[0]).toMatchObject({
        code: 'excessive-granularity',
        severity: 'warning',
        commandIndex: 3,
        message: 'GROUP time bucket 1m over a 1d range yields 1440 buckets (limit 500)',
        suggestion: 'Use a bucket of at least 173s',
      });
    });

    it('accepts a coarse bucket', () => {
      const doc = parseQuery('SOURCE x\nRANGE 1d\nLOAD\nGROUP {interval: 5m}', pipeline);
      expect(checkPerformance(doc)).toEqual([]);
    });

    it('reads the range from loader start and end times', () => {
      const doc = parseQuery('SOURCE x\nLOAD {stime: 0, etime: 3600000}\nGROUP {interval: 1s}', pipeline);
      const issues = checkPerformance(doc);
      expect(issues.map((i) => [i.message, i.suggestion])).toEqual([
        ['GROUP time bucket 1s over a 1h range yields 3600 buckets (limit 500)', 'Use a bucket of at least 8s'],
      ]);
    });

    it('falls back to the configured range and ratio', () => {
      const doc = parseQuery('CATEGORY x\nTAGLOAD\nGROUP {timeunit: 1m, pk: oname}', mxql);
      expect(checkPerformance(doc)).toEqual([]);
      expect(checkPerformance(doc, { timeRangeMs: 86_400_000 }).map((i) => i.code)).toEqual([
        'excessive-granularity',
      ]);
      expect(checkPerformance(doc, { timeRangeMs: 86_400_000, granularityRatio: 2000 })).toEqual([]);
    });

    it('prefers a time-range command over loader times', () => {
      const doc = parseQuery('CATEGORY x\nTIMEPAST 2h\nTAGLOAD {stime: 0, etime: 1000}', mxql);
      expect(detectTimeRange(doc.root)).toBe(7_200_000);
    });
  });

  it('notes the same target aggregated with different functions', () => {
    const text =
      'SOURCE x\nLOAD\nGROUP {by: h}\nAGGREGATE {target: cpu, fn: avg}\nAGGREGATE {target: cpu, fn: max}\nAGGREGATE {target: cpu, fn: avg}';
    const issues = checkPerformance(parseQuery(text, pipeline));
    expect(issues.map((i) => [i.code, i.severity, i.commandIndex, i.message])).toEqual([
      ['combine-aggregations', 'info', 4, "'cpu' is aggregated again with max (already avg)"],
    ]);
  });

  it('never reports critical issues', () => {
    const text = 'SOURCE x\nRANGE 7d\nLOAD\nGROUP {interval: 1s}\nFILTER {key: a}\nPROJECT [*]';
    const issues = checkPerformance(parseQuery(text, pipeline));
    expect(issues.length).toBeGreaterThan(0);
    expect(issues.every((i) => i.severity !== 'critical')).toBe(true);
  });
});
