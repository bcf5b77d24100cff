// ============================================================================
// @mxqlint/core - Semantic Rule Engine
// ============================================================================
//
// Forward state machine over each scope in document order. Flags are never
// reset within a scope: the first grouping command licenses every later
// aggregate, the first ordering command licenses every later bound.
//
// Blocks are analyzed when their opener is reached, with a copy of the
// names visible at that point. A block's own name becomes visible to its
// parent after the block closes.
// ============================================================================

import type { ParsedDocument } from './assembler.js';
import { referencedName } from './command_info.js';
import type { Dialect } from './dialect.js';
import { commandIssue } from './issues.js';
import type { Command, Issue, Query, SubqueryDefinition } from './types.js';
import { getProperty } from './value.js';

interface ScopeState {
  sawSource: boolean;
  sawLoader: boolean;
  sawGroupSinceLastReset: boolean;
  sawOrderSinceLastReset: boolean;
  sawBound: boolean;
  projections: number;
  suppliesData: boolean;
  firstCommand?: Command;
  visible: Set<string>;
}

/** Call-scoped context; one per `checkSemantics` call. */
interface RuleContext {
  dialect: Dialect;
  issues: Issue[];
  blocksByOpener: Map<number, SubqueryDefinition>;
  hasBlocks: boolean;
}

function newState(visible: Iterable<string>): ScopeState {
  return {
    sawSource: false,
    sawLoader: false,
    sawGroupSinceLastReset: false,
    sawOrderSinceLastReset: false,
    sawBound: false,
    projections: 0,
    suppliesData: false,
    visible: new Set(visible),
  };
}

function editDistance(a: string, b: string): number {
  const row = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    let prev = row[0];
    row[0] = i;
    for (let j = 1; j <= b.length; j++) {
      const tmp = row[j];
      row[j] = Math.min(row[j] + 1, row[j - 1] + 1, prev + (a[i - 1] === b[j - 1] ? 0 : 1));
      prev = tmp;
    }
  }
  return row[b.length];
}

function closestKeyword(dialect: Dialect, keyword: string): string | undefined {
  let best: string | undefined;
  let bestDistance = 3;
  for (const candidate of Object.keys(dialect.commands)) {
    const d = editDistance(keyword, candidate);
    if (d < bestDistance) {
      best = candidate;
      bestDistance = d;
    }
  }
  return best;
}

function dataKeywords(dialect: Dialect): string[] {
  return Object.entries(dialect.commands)
    .filter(([, spec]) => spec.suppliesData)
    .map(([keyword]) => keyword);
}

function checkForbiddenKeys(command: Command, ctx: RuleContext): void {
  const forbidden = command.spec?.forbiddenKeys;
  if (!forbidden) return;
  for (const rule of forbidden) {
    if (getProperty(command.payload, rule.key) === undefined) continue;
    ctx.issues.push(
      commandIssue(command, 'critical', 'semantic', 'forbidden-parameter', rule.message, rule.suggestion),
    );
  }
}

function visitCommand(command: Command, state: ScopeState, ctx: RuleContext): void {
  const spec = command.spec;
  if (!spec) {
    const hint = closestKeyword(ctx.dialect, command.keyword);
    ctx.issues.push(
      commandIssue(
        command,
        'warning',
        'semantic',
        'unknown-command',
        `Unknown command '${command.name}'`,
        hint ? `Did you mean ${hint}?` : undefined,
      ),
    );
    return;
  }

  if (spec.role !== 'block-open' && spec.role !== 'block-close') {
    state.firstCommand ??= command;
  }
  if (spec.suppliesData) state.suppliesData = true;
  checkForbiddenKeys(command, ctx);

  switch (spec.role) {
    case 'source':
      state.sawSource = true;
      break;

    case 'loader':
      if (!state.sawSource) {
        ctx.issues.push(
          commandIssue(
            command,
            'critical',
            'semantic',
            'loader-without-source',
            `${command.name} loads data before any source is selected`,
            'Select the data source (e.g. CATEGORY) before loading',
          ),
        );
      }
      state.sawLoader = true;
      break;

    case 'group':
      state.sawGroupSinceLastReset = true;
      break;

    case 'aggregate':
      if (!state.sawGroupSinceLastReset) {
        ctx.issues.push(
          commandIssue(
            command,
            'critical',
            'semantic',
            'aggregate-without-grouping',
            `${command.name} applies an aggregate without a preceding grouping command`,
            'Add a GROUP command before the aggregation',
          ),
        );
      }
      break;

    case 'order':
      state.sawOrderSinceLastReset = true;
      break;

    case 'bound':
      if (!state.sawOrderSinceLastReset && !state.sawBound) {
        ctx.issues.push(
          commandIssue(
            command,
            'warning',
            'semantic',
            'bound-without-order',
            `${command.name} bounds the result without an explicit ordering; the result set is non-deterministic`,
            'Add an ORDER command before bounding the result',
          ),
        );
      }
      state.sawBound = true;
      break;

    case 'projection':
      state.projections++;
      if (state.projections > 1) {
        ctx.issues.push(
          commandIssue(
            command,
            'info',
            'semantic',
            'redundant-projection',
            `Redundant ${command.name}: only the final projection before aggregation affects output`,
            'Merge the projections into one command',
          ),
        );
      }
      break;

    case 'subquery-ref': {
      if (command.payload === undefined) break;
      const name = referencedName(command);
      if (name === undefined || !state.visible.has(name)) {
        ctx.issues.push(
          commandIssue(
            command,
            'critical',
            'semantic',
            'undefined-subquery',
            name === undefined
              ? `${command.name} does not name a subquery`
              : `${command.name} references undefined subquery '${name}'`,
            'Define the subquery block before referencing it',
          ),
        );
      }
      break;
    }

    default:
      break;
  }
}

function checkScope(query: Query, inherited: Iterable<string>, isRoot: boolean, ctx: RuleContext): void {
  const state = newState(inherited);

  for (const command of query.commands) {
    visitCommand(command, state, ctx);

    if (command.spec?.role === 'block-open') {
      const def = ctx.blocksByOpener.get(command.index);
      if (!def) continue;
      checkScope(def.query, state.visible, false, ctx);
      if (def.name.length > 0) state.visible.add(def.name);
    }
  }

  if (state.firstCommand && !state.suppliesData && !(isRoot && ctx.hasBlocks)) {
    const keywords = dataKeywords(ctx.dialect);
    ctx.issues.push(
      commandIssue(
        state.firstCommand,
        'critical',
        'semantic',
        'missing-loader',
        query.name === null
          ? 'Query has no data-loading command'
          : `Subquery '${query.name}' has no data-loading command`,
        `Load data with one of: ${keywords.join(', ')}`,
      ),
    );
  }
}

/** Ordering and dependency rules between pipeline stages. */
export function checkSemantics(doc: ParsedDocument): Issue[] {
  const ctx: RuleContext = {
    dialect: doc.dialect,
    issues: [],
    blocksByOpener: new Map(doc.root.blocks.map((b) => [b.openerIndex, b])),
    hasBlocks: doc.root.blocks.length > 0,
  };
  checkScope(doc.root, [], true, ctx);
  return ctx.issues;
}
