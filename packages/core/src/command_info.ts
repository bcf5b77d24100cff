// ============================================================================
// @mxqlint/core - Command Payload Accessors
// ============================================================================
//
// Reads the parts of a command payload that the rule passes care about,
// driven by the command's spec keys.
// ============================================================================

import type { Command, CommandRole, Value } from './types.js';
import { asText, asTextList, getFirstProperty } from './value.js';

/** Name declared by a source or block-opening command: `SUB {id: x}`, `BLOCK x`, `CATEGORY db_x`. */
export function declaredName(command: Command): string | undefined {
  const { payload, spec } = command;
  if (!payload) return undefined;
  if (payload.kind === 'object') {
    return asText(getFirstProperty(payload, spec?.nameKeys)?.value);
  }
  return asText(payload);
}

/** The raw value naming a source, so callers can tell literals from `$parameters`. */
export function declaredNameValue(command: Command): Value | undefined {
  const { payload, spec } = command;
  if (!payload) return undefined;
  if (payload.kind === 'object') return getFirstProperty(payload, spec?.nameKeys)?.value;
  return payload;
}

/** Subquery named by a reference command: `APPEND {query: x}`, `USE x`. */
export function referencedName(command: Command): string | undefined {
  const { payload, spec } = command;
  if (!payload) return undefined;
  if (payload.kind === 'object') {
    return asText(getFirstProperty(payload, spec?.refKeys)?.value);
  }
  return asText(payload);
}

/**
 * Field names a command refers to. Projections list them as array items;
 * other commands name them under their spec's field keys, or directly as a
 * scalar or array payload (`ORDER cpu`).
 */
export function referencedFields(command: Command): string[] {
  const { payload, spec } = command;
  if (!payload || !spec) return [];
  if (spec.role === 'projection') return asTextList(payload);
  if (!spec.fieldKeys) return [];
  if (payload.kind === 'object') {
    const out: string[] = [];
    for (const key of spec.fieldKeys) {
      for (const entry of payload.entries) {
        if (entry.key === key) out.push(...asTextList(entry.value));
      }
    }
    return out;
  }
  return asTextList(payload);
}

/** Aggregate function of an aggregate command, lower-cased. */
export function aggregateFunction(command: Command): string | undefined {
  const text = asText(getFirstProperty(command.payload, command.spec?.functionKeys)?.value);
  return text?.toLowerCase();
}

/** Time-bucket value of a grouping command (`timeunit: 5m`). */
export function timeBucket(command: Command): Value | undefined {
  return getFirstProperty(command.payload, command.spec?.timeKeys)?.value;
}

/** Comparison literal of a filter command. */
export function comparisonValue(command: Command): Value | undefined {
  return getFirstProperty(command.payload, command.spec?.compareKeys)?.value;
}

/** Fields introduced by a transform (`CREATE {key: ratio}`, `RENAME {dst: name}`). */
export function definedFields(command: Command): string[] {
  const { payload, spec } = command;
  if (!payload || payload.kind !== 'object' || !spec?.definesKeys) return [];
  const out: string[] = [];
  for (const key of spec.definesKeys) {
    for (const entry of payload.entries) {
      if (entry.key === key) out.push(...asTextList(entry.value));
    }
  }
  return out;
}

export function hasRole(command: Command, role: CommandRole): boolean {
  return command.spec?.role === role;
}
