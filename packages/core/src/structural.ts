// ============================================================================
// @mxqlint/core - Structural Validator
// ============================================================================
//
// Per-command well-formedness: delimiter balance, payload parse success and
// payload presence/shape against the command's spec. Critical issues only;
// relationships between commands are left to the rule passes.
// ============================================================================

import type { ParsedDocument } from './assembler.js';
import { commandIssue, queryIssue } from './issues.js';
import type { Command, Issue, PayloadShape } from './types.js';
import { shapeOf } from './value.js';

const SHAPE_LABEL: Record<PayloadShape, string> = {
  object: 'an object {...}',
  array: 'a list [...]',
  scalar: 'a single value',
};

function isEmptyPayload(command: Command): boolean {
  const { payload } = command;
  if (!payload) return false;
  return (
    (payload.kind === 'object' && payload.entries.length === 0) ||
    (payload.kind === 'array' && payload.items.length === 0)
  );
}

function checkCommand(command: Command): Issue[] {
  const issues: Issue[] = [];

  if (command.delimiterError) {
    issues.push(
      commandIssue(
        command,
        'critical',
        'structural',
        'unbalanced-delimiters',
        `${command.name}: ${command.delimiterError}`,
        'Balance every { and [ in the payload before the next command',
      ),
    );
  } else if (command.payloadError) {
    issues.push(
      commandIssue(
        command,
        'critical',
        'structural',
        'payload-parse-error',
        `Cannot parse ${command.name} payload: ${command.payloadError}`,
      ),
    );
  }

  const spec = command.spec;
  if (!spec) return issues;

  if (spec.payload === 'required' && (command.payloadText === undefined || isEmptyPayload(command))) {
    const expected = spec.accepts.map((s) => SHAPE_LABEL[s]).join(' or ');
    issues.push(
      commandIssue(
        command,
        'critical',
        'structural',
        'missing-payload',
        command.payloadText === undefined
          ? `${command.name} requires a payload`
          : `${command.name} payload is empty`,
        expected ? `Provide ${expected} after ${command.name}` : undefined,
      ),
    );
    return issues;
  }

  if (spec.payload === 'none' && command.payloadText !== undefined) {
    issues.push(
      commandIssue(
        command,
        'critical',
        'structural',
        'unexpected-payload',
        `${command.name} takes no payload`,
        `Put ${command.name} on its own line`,
      ),
    );
    return issues;
  }

  if (command.payload && spec.accepts.length > 0) {
    const shape = shapeOf(command.payload);
    if (!spec.accepts.includes(shape)) {
      issues.push(
        commandIssue(
          command,
          'critical',
          'structural',
          'payload-kind-mismatch',
          `${command.name} expects ${spec.accepts.map((s) => SHAPE_LABEL[s]).join(' or ')} but got ${SHAPE_LABEL[shape]}`,
        ),
      );
    }
  }

  return issues;
}

/**
 * Structural pass over every command of every scope.
 * Includes the tokenizer/assembler issues carried on the document.
 */
export function checkStructure(doc: ParsedDocument): Issue[] {
  const issues: Issue[] = [...doc.issues];

  if (doc.commands.length === 0) {
    issues.push(
      queryIssue(
        'critical',
        'structural',
        'empty-query',
        'Query contains no commands',
        'Start with a source command followed by a loader',
      ),
    );
    return issues;
  }

  for (const command of doc.commands) {
    issues.push(...checkCommand(command));
  }
  return issues;
}
