// ============================================================================
// @mxqlint/core - Category Field Check
// ============================================================================
//
// Checks referenced fields against the external category catalog. Each
// literal category name is looked up at most once per call; a missing or
// failing lookup degrades to an Info note.
// ============================================================================

import type { ParsedDocument } from './assembler.js';
import { scopesOf } from './assembler.js';
import { declaredNameValue, definedFields, referencedFields } from './command_info.js';
import { commandIssue } from './issues.js';
import { logLookupFailure } from './logger.js';
import type { CategoryLookup, Command, Issue, Query } from './types.js';
import { asText, isParameter } from './value.js';

type LookupOutcome = { ok: true; fields: Set<string> } | { ok: false; reason: string };

class LookupCache {
  private readonly results = new Map<string, LookupOutcome>();

  constructor(private readonly lookup: CategoryLookup) {}

  get(category: string): LookupOutcome {
    const cached = this.results.get(category);
    if (cached) return cached;
    let outcome: LookupOutcome;
    try {
      const result = this.lookup.lookup(category);
      outcome = result.found
        ? { ok: true, fields: new Set(result.fields.map((f) => f.fieldName)) }
        : { ok: false, reason: 'not found' };
    } catch (e) {
      outcome = { ok: false, reason: e instanceof Error ? e.message : String(e) };
    }
    if (!outcome.ok) logLookupFailure(category, outcome.reason);
    this.results.set(category, outcome);
    return outcome;
  }
}

function isCheckableField(name: string): boolean {
  return name !== '*' && !name.startsWith('$') && !name.includes('(');
}

function checkSection(
  source: Command,
  commands: readonly Command[],
  known: Set<string>,
  category: string,
  issues: Issue[],
): void {
  const defined = new Set<string>();
  for (const command of commands) {
    for (const name of referencedFields(command)) {
      if (!isCheckableField(name) || known.has(name) || defined.has(name)) continue;
      issues.push(
        commandIssue(
          command,
          'warning',
          'semantic',
          'unknown-field',
          `Field '${name}' is not defined in category '${category}'`,
          `Check the field list of ${category} (source on line ${source.line})`,
        ),
      );
    }
    for (const name of definedFields(command)) defined.add(name);
  }
}

function checkScope(query: Query, implicit: readonly string[], cache: LookupCache, issues: Issue[]): void {
  const { commands } = query;
  for (let i = 0; i < commands.length; i++) {
    const source = commands[i];
    if (source.spec?.role !== 'source') continue;

    let end = i + 1;
    while (end < commands.length && commands[end].spec?.role !== 'source') end++;

    const nameValue = declaredNameValue(source);
    const category = asText(nameValue);
    if (category === undefined) continue;

    if (isParameter(nameValue)) {
      issues.push(
        commandIssue(
          source,
          'info',
          'semantic',
          'category-parameter',
          `Category '${category}' is a runtime parameter; field names are not checked`,
        ),
      );
      continue;
    }

    const outcome = cache.get(category);
    if (!outcome.ok) {
      issues.push(
        commandIssue(
          source,
          'info',
          'semantic',
          'category-metadata-unavailable',
          `No field metadata for category '${category}'; field names are not checked`,
        ),
      );
      continue;
    }

    const known = new Set([...outcome.fields, ...implicit]);
    checkSection(source, commands.slice(i + 1, end), known, category, issues);
  }
}

/** Unknown-field pass. Reports nothing without a lookup. */
export function checkFields(doc: ParsedDocument, lookup: CategoryLookup | undefined): Issue[] {
  if (!lookup) return [];
  const issues: Issue[] = [];
  const cache = new LookupCache(lookup);
  for (const scope of scopesOf(doc)) {
    checkScope(scope, doc.dialect.implicitFields, cache, issues);
  }
  return issues;
}
