// ============================================================================
// @mxqlint/core - Payload Value Helpers
// ============================================================================
//
// Presence-checked access into parsed payload trees. Rule passes never probe
// payloads structurally; they go through these helpers.
// ============================================================================

import type { ObjectValue, PayloadShape, SyntheticValue, Value } from './types.js';

const NUMERIC_LITERAL = /^-?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/** Property of an object value, or undefined when absent or not an object. */
export function getProperty(value: Value | undefined, key: string): Value | undefined {
  if (!value || value.kind !== 'object') return undefined;
  for (const entry of value.entries) {
    if (entry.key === key) return entry.value;
  }
  return undefined;
}

/** First present property among `keys`. */
export function getFirstProperty(
  value: Value | undefined,
  keys: readonly string[] | undefined,
): { key: string; value: Value } | undefined {
  if (!keys) return undefined;
  for (const key of keys) {
    const found = getProperty(value, key);
    if (found) return { key, value: found };
  }
  return undefined;
}

export function isObject(value: Value | undefined): value is ObjectValue {
  return value?.kind === 'object';
}

/** Shape bucket used to check a payload against a command's `accepts` list. */
export function shapeOf(value: Value): PayloadShape {
  if (value.kind === 'object') return 'object';
  if (value.kind === 'array') return 'array';
  return 'scalar';
}

/**
 * Text of a scalar literal. Strings, bare words and numbers have text;
 * objects, arrays, booleans and null do not.
 */
export function asText(value: Value | undefined): string | undefined {
  if (!value) return undefined;
  switch (value.kind) {
    case 'string':
    case 'bare':
      return value.value;
    case 'number':
      return value.raw;
    default:
      return undefined;
  }
}

/**
 * Texts of a scalar or of every scalar item in an array.
 * `[cpu, mem]` → `['cpu', 'mem']`, `cpu` → `['cpu']`.
 */
export function asTextList(value: Value | undefined): string[] {
  if (!value) return [];
  if (value.kind === 'array') {
    const out: string[] = [];
    for (const item of value.items) {
      const text = asText(item);
      if (text !== undefined) out.push(text);
    }
    return out;
  }
  const text = asText(value);
  return text === undefined ? [] : [text];
}

/** Numeric value of a literal, accepting quoted or bare text that reads as a finite number. */
export function asNumber(value: Value | undefined): number | undefined {
  if (!value) return undefined;
  if (value.kind === 'number') return value.value;
  const text = asText(value);
  if (text === undefined || !NUMERIC_LITERAL.test(text.trim())) return undefined;
  const n = Number(text);
  return Number.isFinite(n) ? n : undefined;
}

export function isNumericText(text: string): boolean {
  return NUMERIC_LITERAL.test(text);
}

/** Runtime parameters such as `$category` are bare words starting with `$`. */
export function isParameter(value: Value | undefined): boolean {
  const text = asText(value);
  return text !== undefined && text.startsWith('$');
}

/** Structural key list of an object value, in source order. */
export function keysOf(value: Value | undefined): string[] {
  if (!value || value.kind !== 'object') return [];
  return value.entries.map((e) => e.key);
}

// ---------------------------------------------------------------------------
// Conversion
// ---------------------------------------------------------------------------

/** Plain JavaScript form of a value, used for JSON and YAML output. */
export function toPlain(value: Value): unknown {
  switch (value.kind) {
    case 'object': {
      const out: Record<string, unknown> = {};
      for (const entry of value.entries) {
        out[entry.key] = toPlain(entry.value);
      }
      return out;
    }
    case 'array':
      return value.items.map(toPlain);
    case 'null':
      return null;
    default:
      return value.value;
  }
}

function quoteSingle(text: string): string {
  return `'${text.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

/**
 * Inline payload text for one synthetic row, single-quoted keys and strings:
 * `{'cpu':50,'oname':'sample-1'}`.
 */
export function formatRow(row: Record<string, SyntheticValue>): string {
  const parts = Object.entries(row).map(
    ([key, v]) => `${quoteSingle(key)}:${typeof v === 'number' ? String(v) : quoteSingle(v)}`,
  );
  return `{${parts.join(',')}}`;
}
