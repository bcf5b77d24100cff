// ============================================================================
// @mxqlint/core - Style Notes
// ============================================================================

import type { ParsedDocument } from './assembler.js';
import { commandIssue } from './issues.js';
import type { Issue } from './types.js';

/**
 * Readability suggestions recorded by the payload parser. Info only.
 * One issue per command for unquoted keys, one per trailing separator.
 */
export function checkStyle(doc: ParsedDocument): Issue[] {
  const issues: Issue[] = [];

  for (const command of doc.commands) {
    const unquoted = command.styleNotes.filter((n) => n.kind === 'unquoted-key').map((n) => n.detail);
    if (unquoted.length > 0) {
      issues.push(
        commandIssue(
          command,
          'info',
          'style',
          'unquoted-key',
          'Field names without quotes (valid but not recommended for readability)',
          `Consider using quotes: ${unquoted.join(', ')}`,
        ),
      );
    }

    for (const note of command.styleNotes) {
      if (note.kind !== 'trailing-separator') continue;
      issues.push(
        commandIssue(
          command,
          'info',
          'style',
          'trailing-separator',
          `Trailing ',' before '${note.detail}' in ${command.name} payload`,
          'Remove the trailing separator',
        ),
      );
    }
  }

  return issues;
}
