// ============================================================================
// @mxqlint/core - Command Assembler
// ============================================================================
//
// Turns tokens into commands and scopes. Block openers push a subquery
// scope, block closers pop it and register the finished Query under its
// name in the parent. Blocks do not nest: an opener inside an open block
// closes that block first.
//
//   Unmatched closer     → critical, ignored for scoping
//   Opener never closed  → critical, closed at end of input
//   Opener inside block  → critical, previous block closed implicitly
// ============================================================================

import { declaredName } from './command_info.js';
import { type Dialect, findCommandSpec, keywordMatcher } from './dialect.js';
import { commandIssue } from './issues.js';
import { parsePayload } from './payload_parser.js';
import { type CommandToken, tokenize } from './tokenizer.js';
import type { Command, Issue, Query, StyleNote, SubqueryDefinition, Value } from './types.js';

/** Result of parsing one query text. Read-only once returned. */
export interface ParsedDocument {
  readonly text: string;
  readonly dialect: Dialect;
  readonly root: Query;
  /** Every command of every scope in document order; `commands[i].index === i`. */
  readonly commands: readonly Command[];
  /** Structural issues found while tokenizing and assembling scopes. */
  readonly issues: readonly Issue[];
}

interface ScopeBuilder {
  name: string | null;
  commands: Command[];
  blocks: SubqueryDefinition[];
  subqueries: Map<string, SubqueryDefinition>;
  opener?: Command;
}

function newScope(name: string | null, opener?: Command): ScopeBuilder {
  return { name, commands: [], blocks: [], subqueries: new Map(), opener };
}

function freeze(scope: ScopeBuilder): Query {
  return Object.freeze({
    name: scope.name,
    commands: Object.freeze([...scope.commands]),
    blocks: Object.freeze([...scope.blocks]),
    subqueries: scope.subqueries,
  });
}

function buildCommand(token: CommandToken, index: number, dialect: Dialect, scope: string | null): Command {
  const keyword = token.name.toUpperCase();
  let payload: Value | undefined;
  let payloadError: string | undefined;
  let styleNotes: StyleNote[] = [];

  if (token.payload && !token.delimiterError) {
    const result = parsePayload(token.payload.text);
    if (result.ok) {
      payload = result.value;
      styleNotes = result.notes;
    } else {
      payloadError = `${result.error.message} (payload column ${result.error.offset + 1})`;
    }
  }

  return Object.freeze({
    index,
    name: token.name,
    keyword,
    spec: findCommandSpec(dialect, keyword),
    payload,
    payloadText: token.payload?.text,
    payloadError,
    delimiterError: token.delimiterError,
    styleNotes,
    line: token.line,
    column: token.column,
    startOffset: token.startOffset,
    endOffset: token.endOffset,
    scope,
  });
}

/**
 * Parse query text into scopes and commands.
 *
 * @example
 * ```ts
 * const doc = parseQuery('SUB {id: t}\nADDROW {a: 1}\nEND\nAPPEND {query: t}', getDialect('mxql'));
 * doc.root.commands.map((c) => c.keyword); // ['SUB', 'APPEND']
 * doc.root.subqueries.get('t')?.query.commands.length; // 2 (ADDROW, END)
 * ```
 */
export function parseQuery(text: string, dialect: Dialect): ParsedDocument {
  const { tokens, stray } = tokenize(text, keywordMatcher(dialect));
  const issues: Issue[] = [];
  const commands: Command[] = [];
  const root = newScope(null);
  let block: ScopeBuilder | null = null;

  const register = (scope: ScopeBuilder, closerIndex: number): void => {
    const opener = scope.opener;
    if (!opener || scope.name === null) return;
    const def: SubqueryDefinition = Object.freeze({
      name: scope.name,
      query: freeze(scope),
      openerIndex: opener.index,
      closerIndex,
    });
    root.blocks.push(def);
    // Unnamed blocks are still analyzed but cannot be referenced.
    if (scope.name.length === 0) return;
    if (root.subqueries.has(scope.name)) {
      issues.push(
        commandIssue(
          opener,
          'warning',
          'structural',
          'duplicate-subquery',
          `Subquery '${scope.name}' is defined more than once; the later definition wins`,
          'Give each SUB block a distinct id',
        ),
      );
    }
    root.subqueries.set(scope.name, def);
  };

  for (let index = 0; index < tokens.length; index++) {
    const token = tokens[index];
    const current: ScopeBuilder = block ?? root;
    const command = buildCommand(token, index, dialect, current.name);
    const role = command.spec?.role;
    commands.push(command);

    if (role === 'block-open') {
      // The opener belongs to the parent scope.
      const opener: Command = command.scope === null ? command : Object.freeze({ ...command, scope: null });
      commands[index] = opener;
      if (block) {
        issues.push(
          commandIssue(
            opener,
            'critical',
            'structural',
            'nested-block',
            `${opener.name} opened inside block '${block.name ?? ''}' before its closing command`,
            'Close the previous block before opening another one',
          ),
        );
        register(block, -1);
        block = null;
      }
      root.commands.push(opener);
      const name = declaredName(opener);
      if (name === undefined && opener.payload !== undefined) {
        issues.push(
          commandIssue(
            opener,
            'critical',
            'structural',
            'missing-block-name',
            `${opener.name} does not name its subquery`,
            'Name the block, e.g. SUB {id: my_data}',
          ),
        );
      }
      block = newScope(name ?? '', opener);
      continue;
    }

    if (role === 'block-close') {
      if (!block) {
        issues.push(
          commandIssue(
            command,
            'critical',
            'structural',
            'unmatched-block-close',
            `${command.name} without a matching block opener`,
            'Remove the extra closing command or add the missing opener',
          ),
        );
        root.commands.push(command);
        continue;
      }
      block.commands.push(command);
      register(block, command.index);
      block = null;
      continue;
    }

    current.commands.push(command);
  }

  if (block) {
    const open = block;
    if (open.opener) {
      issues.push(
        commandIssue(
          open.opener,
          'critical',
          'structural',
          'unclosed-block',
          `Block '${open.name ?? ''}' is never closed`,
          'Add a closing command (END) after the block',
        ),
      );
    }
    register(open, -1);
  }

  for (const s of stray) {
    issues.push({
      severity: 'critical',
      category: 'structural',
      code: 'stray-text',
      message: `Unexpected text '${s.text}' does not start a command`,
      commandIndex: s.afterToken,
      line: s.line,
      scope: s.afterToken >= 0 ? commands[s.afterToken].scope : null,
      suggestion: 'Start each command with its keyword, or comment the line out with #',
    });
  }

  return Object.freeze({
    text,
    dialect,
    root: freeze(root),
    commands: Object.freeze(commands),
    issues: Object.freeze(issues),
  });
}

/** Depth-first list of scopes: the root first, then each block in definition order. */
export function scopesOf(doc: ParsedDocument): Query[] {
  return [doc.root, ...doc.root.blocks.map((b) => b.query)];
}
