// ============================================================================
// @mxqlint/core - Duration Literals
// ============================================================================

import type { Value } from './types.js';
import { asText } from './value.js';

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
  w: 604_800_000,
};

const DURATION = /^(\d+(?:\.\d+)?)\s*(ms|s|m|h|d|w)?$/i;

/**
 * Milliseconds of a duration literal: `300000`, `5m`, `1.5h`, `7d`.
 * A bare number is milliseconds. Returns undefined for anything else,
 * including zero and negative values.
 */
export function parseDuration(input: Value | string | undefined): number | undefined {
  if (input === undefined) return undefined;
  if (typeof input !== 'string' && input.kind === 'number') {
    return input.value > 0 ? input.value : undefined;
  }
  const text = typeof input === 'string' ? input : asText(input);
  if (text === undefined) return undefined;
  const match = DURATION.exec(text.trim());
  if (!match) return undefined;
  const unit = (match[2] ?? 'ms').toLowerCase();
  const ms = Number(match[1]) * UNIT_MS[unit];
  return ms > 0 ? ms : undefined;
}

/** Compact rendering used in messages: `86400000` → `1d`, `90000` → `90s`. */
export function formatDuration(ms: number): string {
  for (const unit of ['w', 'd', 'h', 'm', 's']) {
    const size = UNIT_MS[unit];
    if (ms >= size && ms % size === 0) return `${ms / size}${unit}`;
  }
  return `${ms}ms`;
}
