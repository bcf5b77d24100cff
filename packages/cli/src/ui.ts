// ============================================================================
// @mxqlint/cli - Terminal Styling
// ============================================================================

import type { Severity } from '@mxqlint/core';

export interface ColorEnv {
  args: readonly string[];
  env: Record<string, string | undefined>;
  isTTY: boolean;
}

export function supportsColor({ args, env, isTTY }: ColorEnv): boolean {
  const end = args.indexOf('--');
  const options = end === -1 ? args : args.slice(0, end);
  if (options.includes('--no-color') || env.NO_COLOR === '1') return false;
  if (options.includes('--color')) return true;
  if (env.FORCE_COLOR === '1') return true;
  return isTTY;
}

export interface Palette {
  enabled: boolean;
  reset: string;
  bold: string;
  dim: string;
  red: string;
  green: string;
  yellow: string;
  cyan: string;
  gray: string;
}

// ── ANSI Color Helpers ──────────────────────────────────────────────────────
export function createPalette(enabled: boolean): Palette {
  return {
    enabled,
    reset: enabled ? '\x1b[0m' : '',
    bold: enabled ? '\x1b[1m' : '',
    dim: enabled ? '\x1b[2m' : '',
    red: enabled ? '\x1b[31m' : '',
    green: enabled ? '\x1b[32m' : '',
    yellow: enabled ? '\x1b[33m' : '',
    cyan: enabled ? '\x1b[36m' : '',
    gray: enabled ? '\x1b[90m' : '',
  };
}

export function clr(palette: Palette, color: string, text: string): string {
  if (!palette.enabled) return text;
  return `${color}${text}${palette.reset}`;
}

const SEVERITY_COLOR: Record<Severity, 'red' | 'yellow' | 'cyan'> = {
  critical: 'red',
  warning: 'yellow',
  info: 'cyan',
};

/** Section-title decorator for `formatReport`. */
export function severityDecorator(palette: Palette): (severity: Severity, text: string) => string {
  return (severity, text) => {
    return clr(palette, palette.bold + palette[SEVERITY_COLOR[severity]], text);
  };
}
