// ============================================================================
// @mxqlint/core - Dialects
// ============================================================================
//
// A dialect maps command keywords to CommandSpecs. Every rule pass works on
// roles (source, loader, group, ...), so the same engine checks MXQL and the
// generic pipeline vocabulary.
// ============================================================================

import { mxqlDialect } from './dialects/mxql.js';
import { pipelineDialect } from './dialects/pipeline.js';
import { ConfigError } from './errors.js';
import type { CommandSpec } from './types.js';

/** How the fixture synthesizer writes the commands it injects. */
export interface FixtureTemplates {
  openBlock(name: string): string;
  row(rowText: string): string;
  closeBlock(): string;
  /** A data-supplying reference to a block. */
  reference(name: string): string;
}

export interface Dialect {
  name: DialectName;
  /** Keyed by upper-case keyword. */
  commands: Readonly<Record<string, CommandSpec>>;
  /** Fields every record carries regardless of category metadata. */
  implicitFields: readonly string[];
  /** Field name used for synthesized timestamps. */
  timeField: string;
  fixture: FixtureTemplates;
}

export type DialectName = 'mxql' | 'pipeline';

export const DIALECT_NAMES: readonly DialectName[] = ['mxql', 'pipeline'];

const DIALECTS: Record<DialectName, Dialect> = {
  mxql: mxqlDialect,
  pipeline: pipelineDialect,
};

function isDialectName(name: string): name is DialectName {
  return (DIALECT_NAMES as readonly string[]).includes(name);
}

/**
 * Resolve a built-in dialect by name.
 * @throws {ConfigError} for an unknown name
 */
export function getDialect(name: string): Dialect {
  if (!isDialectName(name)) {
    throw new ConfigError(`Unknown dialect "${name}". Available: ${DIALECT_NAMES.join(', ')}`, {
      paths: ['dialect'],
    });
  }
  return DIALECTS[name];
}

/** Case-insensitive keyword lookup. */
export function findCommandSpec(dialect: Dialect, keyword: string): CommandSpec | undefined {
  const key = keyword.toUpperCase();
  return Object.prototype.hasOwnProperty.call(dialect.commands, key)
    ? dialect.commands[key]
    : undefined;
}

export function keywordMatcher(dialect: Dialect): (word: string) => boolean {
  return (word) => findCommandSpec(dialect, word) !== undefined;
}
