import { describe, expect, it } from 'vitest';
import { formatReport, summaryLine } from '../report.js';
import { validateQuery } from '../validate.js';

describe('formatReport', () => {
  it('prints a short line for a clean query', () => {
    const report = validateQuery('CATEGORY x\nTAGLOAD\nORDER {"key": "cpu"}\nLIMIT 5');
    expect(formatReport(report)).toBe('Query is valid.\n');
  });

  it('groups issues by severity with suggestions', () => {
    const report = validateQuery('CATEGORY x\nTAGLOAD\nLIMIT 5\nUPDATE {key: cpu, value: avg}');
    expect(formatReport(report)).toBe(
      [
        'Query has critical issues (1 critical, 1 warnings, 1 info)',
        '',
        'Critical Issues:',
        '  Line 4 [aggregate-without-grouping]: UPDATE applies an aggregate without a preceding grouping command',
        '    -> Add a GROUP command before the aggregation',
        '',
        'Warnings:',
        '  Line 3 [bound-without-order]: LIMIT bounds the result without an explicit ordering; the result set is non-deterministic',
        '    -> Add an ORDER command before bounding the result',
        '',
        'Suggestions:',
        '  Line 4 [unquoted-key]: Field names without quotes (valid but not recommended for readability)',
        '    -> Consider using quotes: key, value',
        '',
      ].join('\n'),
    );
  });

  it('labels query-level issues and subquery scopes', () => {
    expect(formatReport(validateQuery(''))).toBe(
      [
        'Query has critical issues (1 critical, 0 warnings, 0 info)',
        '',
        'Critical Issues:',
        '  Query [empty-query]: Query contains no commands',
        '    -> Start with a source command followed by a loader',
        '',
      ].join('\n'),
    );
    const scoped = validateQuery("SUB {'id': 'a'}\nSELECT ['x']\nEND");
    expect(formatReport(scoped)).toContain("  Line 2 (a) [missing-loader]: Subquery 'a' has no data-loading command");
  });

  it('decorates section titles', () => {
    const report = validateQuery('CATEGORY x\nTAGLOAD\nLIMIT 5');
    const text = formatReport(report, { decorate: (severity, title) => `<${severity}>${title}` });
    expect(text.split('\n')[2]).toBe('<warning>Warnings:');
  });
});

describe('summaryLine', () => {
  it('counts each severity', () => {
    expect(summaryLine(validateQuery('CATEGORY x\nTAGLOAD\nLIMIT 5'))).toBe(
      'Query is valid (0 critical, 1 warnings, 0 info)',
    );
  });
});
