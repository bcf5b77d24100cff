// ============================================================================
// @mxqlint/core - Field Reference Extractor
// ============================================================================
//
// Collects the distinct field names a query touches, with the role and
// position where each was first seen, and guesses a type for each.
// ============================================================================

import type { ParsedDocument } from './assembler.js';
import { aggregateFunction, comparisonValue, referencedFields } from './command_info.js';
import type { CommandRole, FieldReference, FieldRole, FieldType } from './types.js';
import { asNumber, isParameter } from './value.js';

const FIELD_ROLES: Partial<Record<CommandRole, FieldRole>> = {
  projection: 'select',
  filter: 'filter',
  group: 'group',
  aggregate: 'update',
  order: 'order',
};

/** Aggregate functions whose input must be numeric. */
export const NUMERIC_FUNCTIONS: ReadonlySet<string> = new Set([
  'sum',
  'avg',
  'min',
  'max',
  'median',
  'stddev',
  'variance',
  'rate',
  'p50',
  'p90',
  'p95',
  'p99',
]);

function isFieldName(name: string): boolean {
  return name.length > 0 && name !== '*' && !name.startsWith('$');
}

/**
 * Distinct field references across every scope, in document order.
 *
 * @example
 * ```ts
 * extractFieldReferences(parseQuery('SOURCE x\nLOAD\nPROJECT [name, cpu]\nORDER cpu', dialect))
 *   .map((f) => `${f.name}:${f.role}`); // ['name:select', 'cpu:select']
 * ```
 */
export function extractFieldReferences(doc: ParsedDocument): FieldReference[] {
  const seen = new Map<string, FieldReference>();
  for (const command of doc.commands) {
    const role = command.spec ? FIELD_ROLES[command.spec.role] : undefined;
    if (!role) continue;
    for (const name of referencedFields(command)) {
      if (!isFieldName(name) || seen.has(name)) continue;
      seen.set(name, {
        name,
        role,
        commandIndex: command.index,
        line: command.line,
        scope: command.scope,
      });
    }
  }
  return [...seen.values()];
}

/**
 * Type guess per referenced field: numeric when compared with a numeric
 * literal or passed to a numeric aggregate function, otherwise string.
 */
export function inferFieldTypes(doc: ParsedDocument): Map<string, FieldType> {
  const types = new Map<string, FieldType>();
  for (const ref of extractFieldReferences(doc)) {
    types.set(ref.name, 'string');
  }

  for (const command of doc.commands) {
    const role = command.spec?.role;
    let numeric = false;
    if (role === 'filter') {
      const literal = comparisonValue(command);
      numeric = literal !== undefined && !isParameter(literal) && asNumber(literal) !== undefined;
    } else if (role === 'aggregate') {
      const fn = aggregateFunction(command);
      numeric = fn !== undefined && NUMERIC_FUNCTIONS.has(fn);
    }
    if (!numeric) continue;
    for (const name of referencedFields(command)) {
      if (types.has(name)) types.set(name, 'number');
    }
  }

  return types;
}
