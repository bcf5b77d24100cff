// ============================================================================
// @mxqlint/core - Sample Row Synthesizer
// ============================================================================
//
// Generates a few plausible rows for the fields a query uses and splices a
// literal-data block into the query text so it can run without a live
// data source:
//
//   # Test: <description>          (optional)
//   SUB {id: test_data}            ← before the top-level source
//   ADDROW {...} × N
//   END
//   CATEGORY db_x
//   TAGLOAD
//   APPEND {query: test_data}      ← after the first loader following the source
//   ...
//
// All other commands are left as written.
// ============================================================================

import { type ParsedDocument, parseQuery } from './assembler.js';
import { timeBucket } from './command_info.js';
import { parseDuration } from './duration.js';
import { extractFieldReferences, inferFieldTypes } from './fields.js';
import type { Command, FieldReference, FieldType, SyntheticRow, SyntheticValue } from './types.js';
import { formatRow } from './value.js';

export const DEFAULT_SAMPLE_ROWS = 3;
export const DEFAULT_BLOCK_NAME = 'test_data';
const BASE_TIMESTAMP = 1_700_000_000_000;
const DEFAULT_TIME_STEP_MS = 60_000;

interface NumericSeries {
  base: number;
  step: number;
}

/** First matching rule wins. */
const NUMERIC_SERIES: { test: (name: string) => boolean; series: NumericSeries }[] = [
  { test: (n) => n === 'oid' || n === 'id', series: { base: 1000, step: 1 } },
  { test: (n) => n.includes('cpu'), series: { base: 50, step: 10 } },
  { test: (n) => n.includes('mem'), series: { base: 60, step: 5 } },
  { test: (n) => n.includes('count'), series: { base: 100, step: 10 } },
  { test: (n) => n.includes('pct') || n.includes('percent'), series: { base: 70, step: 1 } },
  { test: (n) => n.includes('execute'), series: { base: 50, step: 5 } },
];

const DEFAULT_SERIES: NumericSeries = { base: 10, step: 10 };

export interface SynthesisOptions {
  /** Rows to generate. Default 3. */
  rows?: number;
}

export interface SynthesisResult {
  fields: FieldReference[];
  types: Map<string, FieldType>;
  rows: SyntheticRow[];
}

export interface FixtureOptions extends SynthesisOptions {
  /** Preferred block name; a numeric suffix is added on collision. */
  blockName?: string;
  /** Written as a `# Test: ...` comment above the block. */
  description?: string;
}

export interface FixtureResult extends SynthesisResult {
  text: string;
  document: ParsedDocument;
  blockName: string;
}

function seriesFor(name: string): NumericSeries {
  const lower = name.toLowerCase();
  return NUMERIC_SERIES.find((rule) => rule.test(lower))?.series ?? DEFAULT_SERIES;
}

function sampleValue(name: string, type: FieldType, i: number): SyntheticValue {
  if (type === 'string') return `sample-${i + 1}`;
  const { base, step } = seriesFor(name);
  return base + i * step;
}

/** Bucket step of the first time-bucketing group command, if any. */
function timeStep(doc: ParsedDocument): number | undefined {
  for (const command of doc.commands) {
    if (command.spec?.role !== 'group') continue;
    const bucket = timeBucket(command);
    if (bucket === undefined) continue;
    return parseDuration(bucket) ?? DEFAULT_TIME_STEP_MS;
  }
  return undefined;
}

/**
 * Sample rows for every field the query references.
 *
 * @example
 * ```ts
 * synthesizeRows(parseQuery('SOURCE x\nLOAD\nFILTER {key: cpu, cmp: gt, value: 80}', dialect)).rows;
 * // [{ cpu: 50 }, { cpu: 60 }, { cpu: 70 }]
 * ```
 */
export function synthesizeRows(doc: ParsedDocument, options: SynthesisOptions = {}): SynthesisResult {
  const count = options.rows ?? DEFAULT_SAMPLE_ROWS;
  const fields = extractFieldReferences(doc);
  const types = inferFieldTypes(doc);
  const step = timeStep(doc);
  const timeField = doc.dialect.timeField;

  const rows: SyntheticRow[] = [];
  for (let i = 0; i < count; i++) {
    const row: SyntheticRow = {};
    if (step !== undefined) row[timeField] = BASE_TIMESTAMP + i * step;
    for (const field of fields) {
      if (step !== undefined && field.name === timeField) continue;
      row[field.name] = sampleValue(field.name, types.get(field.name) ?? 'string', i);
    }
    rows.push(row);
  }

  if (step !== undefined) types.set(timeField, 'number');
  return { fields, types, rows };
}

function uniqueBlockName(doc: ParsedDocument, preferred: string): string {
  const taken = new Set(doc.root.blocks.map((b) => b.name));
  if (!taken.has(preferred)) return preferred;
  let n = 2;
  while (taken.has(`${preferred}_${n}`)) n++;
  return `${preferred}_${n}`;
}

function lineStart(text: string, offset: number): number {
  return text.lastIndexOf('\n', offset - 1) + 1;
}

function lineEnd(text: string, offset: number): number {
  const nl = text.indexOf('\n', offset);
  return nl === -1 ? text.length : nl;
}

/** Where the data reference goes: after the first loader following the source, else after the source. */
function referenceAnchor(root: readonly Command[], source: Command | undefined): Command | undefined {
  if (!source) return undefined;
  const after = root.slice(root.indexOf(source) + 1);
  return after.find((c) => c.spec?.role === 'loader') ?? source;
}

/**
 * Query text with an injected literal-data block and a reference to it,
 * re-parsed with the same dialect.
 */
export function buildFixture(doc: ParsedDocument, options: FixtureOptions = {}): FixtureResult {
  const synthesis = synthesizeRows(doc, options);
  const { fixture } = doc.dialect;
  const blockName = uniqueBlockName(doc, options.blockName ?? DEFAULT_BLOCK_NAME);

  const blockLines: string[] = [];
  if (options.description) blockLines.push(`# Test: ${options.description}`);
  blockLines.push(fixture.openBlock(blockName));
  for (const row of synthesis.rows) blockLines.push(fixture.row(formatRow(row)));
  blockLines.push(fixture.closeBlock());
  const reference = fixture.reference(blockName);

  const { text } = doc;
  const source = doc.root.commands.find((c) => c.spec?.role === 'source');
  const anchor = referenceAnchor(doc.root.commands, source);

  let output: string;
  if (!source || !anchor) {
    const rest = text.length > 0 ? `\n${text}` : '\n';
    output = `${blockLines.join('\n')}\n${reference}${rest}`;
  } else {
    const blockAt = lineStart(text, source.startOffset);
    const refAt = lineEnd(text, anchor.endOffset);
    output =
      text.slice(0, blockAt) +
      `${blockLines.join('\n')}\n` +
      text.slice(blockAt, refAt) +
      `\n${reference}` +
      text.slice(refAt);
  }

  return {
    ...synthesis,
    text: output,
    document: parseQuery(output, doc.dialect),
    blockName,
  };
}
