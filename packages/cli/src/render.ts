// ============================================================================
// @mxqlint/cli - Output Rendering
// ============================================================================
//
// Machine-readable output for every command. Text output is produced by the
// command itself; json and yaml go through `renderData`.
// ============================================================================

import yaml from 'js-yaml';
import type { FieldReference, FieldType, FixtureResult, ValidationReport } from '@mxqlint/core';

export type OutputFormat = 'text' | 'json' | 'yaml';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json', 'yaml'];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((f) => f === value);
}

/**
 * Serialize plain data for `json` or `yaml` output. Always ends with a newline.
 */
export function renderData(data: unknown, format: Exclude<OutputFormat, 'text'>): string {
  switch (format) {
    case 'json':
      return `${JSON.stringify(data, null, 2)}\n`;
    case 'yaml':
      return yaml.dump(data, { noRefs: true, skipInvalid: true, lineWidth: -1 });
    default:
      throw new Error(`Unsupported format: ${String(format)}`);
  }
}

/** Report of one input, labelled with where it came from. */
export interface SourcedReport extends ValidationReport {
  source: string;
}

export function sourcedReport(source: string, report: ValidationReport): SourcedReport {
  return { source, ...report };
}

export interface FieldRow {
  name: string;
  type: FieldType;
  role: string;
  line: number;
  scope: string | null;
}

export function fieldRows(refs: readonly FieldReference[], types: ReadonlyMap<string, FieldType>): FieldRow[] {
  return refs.map((ref) => ({
    name: ref.name,
    type: types.get(ref.name) ?? 'string',
    role: ref.role,
    line: ref.line,
    scope: ref.scope,
  }));
}

/** Aligned `name  type  role  line` table. */
export function formatFieldTable(rows: readonly FieldRow[]): string {
  if (rows.length === 0) return 'No field references.\n';
  const width = Math.max(...rows.map((r) => r.name.length));
  const lines = rows.map((r) => {
    const scope = r.scope ? ` (${r.scope})` : '';
    return `${r.name.padEnd(width)}  ${r.type.padEnd(6)}  ${r.role.padEnd(6)}  line ${r.line}${scope}`;
  });
  return `${lines.join('\n')}\n`;
}

export interface FixtureData {
  blockName: string;
  fields: FieldRow[];
  rows: FixtureResult['rows'];
  text: string;
}

export function fixtureData(fixture: FixtureResult): FixtureData {
  return {
    blockName: fixture.blockName,
    fields: fieldRows(fixture.fields, fixture.types),
    rows: fixture.rows,
    text: fixture.text,
  };
}
