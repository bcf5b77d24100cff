// ============================================================================
// @mxqlint/core - Command Tokenizer
// ============================================================================
//
// Splits query text into command tokens: a keyword plus an optional raw
// payload. A payload is either delimited (`{...}` / `[...]`, possibly over
// several lines) or the rest of the keyword's line (`LIMIT 10`).
//
// The tokenizer never fails. A payload whose closer never comes ends at
// the first line inside it that starts with a known keyword, or at end of
// input, and carries a delimiter error so the remaining commands are still
// tokenized.
// ============================================================================

export interface RawPayload {
  text: string;
  line: number;
  column: number;
  startOffset: number;
  delimited: boolean;
}

export interface CommandToken {
  name: string;
  line: number;
  column: number;
  startOffset: number;
  endOffset: number;
  payload?: RawPayload;
  delimiterError?: string;
}

/** Text that could not start a command, skipped to end of line. */
export interface StrayText {
  text: string;
  line: number;
  column: number;
  offset: number;
  /** Index of the last token before this text, `-1` when none. */
  afterToken: number;
}

export interface TokenizeResult {
  tokens: CommandToken[];
  stray: StrayText[];
}

const CLOSER: Record<string, string> = { '{': '}', '[': ']' };

function isIdentStart(ch: string | undefined): boolean {
  return ch !== undefined && /[A-Za-z]/.test(ch);
}

function isIdentChar(ch: string | undefined): boolean {
  return ch !== undefined && /[A-Za-z0-9_-]/.test(ch);
}

function isBlank(ch: string | undefined): boolean {
  return ch === ' ' || ch === '\t';
}

function isCommentStart(text: string, pos: number): boolean {
  return (
    text[pos] === '#' || text.startsWith('//', pos) || text.startsWith('--', pos)
  );
}

/** Line content up to a comment that follows whitespace outside quotes, trimmed at the end. */
function stripTrailingComment(line: string): string {
  let quote: string | null = null;
  for (let i = 0; i < line.length; i++) {
    const c = line[i];
    if (quote !== null) {
      if (c === '\\') i++;
      else if (c === quote) quote = null;
      continue;
    }
    if (c === '"' || c === "'") {
      quote = c;
      continue;
    }
    if (i > 0 && isBlank(line[i - 1]) && (isCommentStart(line, i) || line.startsWith('/*', i))) {
      return line.slice(0, i).trimEnd();
    }
  }
  return line.trimEnd();
}

class Scanner {
  private readonly lineStarts: number[] = [0];

  constructor(
    private readonly text: string,
    private readonly isKeyword: (word: string) => boolean,
  ) {
    for (let i = 0; i < text.length; i++) {
      if (text[i] === '\n') this.lineStarts.push(i + 1);
    }
  }

  /** 1-based line and column of an offset. */
  locate(offset: number): { line: number; column: number } {
    let lo = 0;
    let hi = this.lineStarts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (this.lineStarts[mid] <= offset) lo = mid;
      else hi = mid - 1;
    }
    return { line: lo + 1, column: offset - this.lineStarts[lo] + 1 };
  }

  endOfLine(pos: number): number {
    const nl = this.text.indexOf('\n', pos);
    return nl === -1 ? this.text.length : nl;
  }

  /**
   * Whether the line starting at `pos` opens with a known keyword used as a
   * command (not as an object key such as `order: 1`).
   */
  lineStartsCommand(pos: number): boolean {
    let i = pos;
    while (isBlank(this.text[i])) i++;
    if (!isIdentStart(this.text[i])) return false;
    const start = i;
    while (isIdentChar(this.text[i])) i++;
    const word = this.text.slice(start, i);
    let j = i;
    while (isBlank(this.text[j])) j++;
    const follow = this.text[j];
    if (follow === ':' || follow === ',') return false;
    return this.isKeyword(word);
  }

  /**
   * Scans a delimited payload starting at an opening `{` or `[`.
   * Quoted strings hide delimiters and end at a line break. Keyword lines
   * inside the payload matter only when no closer is ever found: the
   * payload is then cut before the first of them.
   */
  scanDelimited(start: number): { end: number; error?: string } {
    const stack: string[] = [];
    let mismatch: string | undefined;
    let mismatchAt = -1;
    let quote: string | null = null;
    let boundary: number | undefined;
    let i = start;

    while (i < this.text.length) {
      const c = this.text[i];

      if (quote !== null && c !== '\n') {
        if (c === '\\') {
          i += 2;
          continue;
        }
        if (c === quote) quote = null;
        i++;
        continue;
      }

      if (c === '"' || c === "'") {
        quote = c;
        i++;
        continue;
      }

      if (c === '{' || c === '[') {
        stack.push(c);
        i++;
        continue;
      }

      if (c === '}' || c === ']') {
        const opener = stack.pop();
        const expected = opener === undefined ? undefined : CLOSER[opener];
        if (c !== expected && mismatch === undefined) {
          mismatch = `Mismatched delimiter: expected '${expected}' but found '${c}'`;
          mismatchAt = i;
        }
        i++;
        if (stack.length === 0) return { end: i, error: mismatch };
        continue;
      }

      if (c === '\n') {
        quote = null;
        if (boundary === undefined && this.lineStartsCommand(i + 1)) boundary = i;
      }
      i++;
    }

    const end = boundary ?? this.text.length;
    const unclosed = `Unclosed '${stack[stack.length - 1]}'`;
    return { end, error: mismatch !== undefined && mismatchAt < end ? mismatch : unclosed };
  }
}

/**
 * Tokenize query text into commands.
 *
 * @param text - Query text
 * @param isKeyword - Recognizes command keywords; used only to recover from unbalanced payloads
 *
 * @example
 * ```ts
 * const { tokens } = tokenize('CATEGORY db_x\nTAGLOAD\nLIMIT 10', isKeyword);
 * tokens.map((t) => t.name); // ['CATEGORY', 'TAGLOAD', 'LIMIT']
 * tokens[2].payload?.text;   // '10'
 * ```
 */
export function tokenize(text: string, isKeyword: (word: string) => boolean): TokenizeResult {
  const scanner = new Scanner(text, isKeyword);
  const tokens: CommandToken[] = [];
  const stray: StrayText[] = [];
  let pos = 0;

  while (pos < text.length) {
    const ch = text[pos];

    if (ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r') {
      pos++;
      continue;
    }

    if (isCommentStart(text, pos)) {
      pos = scanner.endOfLine(pos);
      continue;
    }

    if (text.startsWith('/*', pos)) {
      const close = text.indexOf('*/', pos + 2);
      pos = close === -1 ? text.length : close + 2;
      continue;
    }

    if (!isIdentStart(ch)) {
      const eol = scanner.endOfLine(pos);
      const loc = scanner.locate(pos);
      stray.push({
        text: text.slice(pos, eol).trimEnd(),
        line: loc.line,
        column: loc.column,
        offset: pos,
        afterToken: tokens.length - 1,
      });
      pos = eol;
      continue;
    }

    // ---- Keyword ----
    const nameStart = pos;
    while (isIdentChar(text[pos])) pos++;
    const name = text.slice(nameStart, pos);
    const nameLoc = scanner.locate(nameStart);

    let p = pos;
    while (isBlank(text[p])) p++;

    const token: CommandToken = {
      name,
      line: nameLoc.line,
      column: nameLoc.column,
      startOffset: nameStart,
      endOffset: pos,
    };

    if (text[p] === '{' || text[p] === '[') {
      // ---- Delimited payload ----
      const scan = scanner.scanDelimited(p);
      let end = scan.end;
      if (!scan.error) {
        // Content after the closing delimiter belongs to the payload unless it is a comment.
        const eol = scanner.endOfLine(end);
        const rest = text.slice(end, eol);
        const trimmed = rest.trim();
        if (trimmed.length > 0 && !isCommentStart(trimmed, 0) && !trimmed.startsWith('/*')) {
          end += stripTrailingComment(rest).length;
        }
      }
      const payloadText = text.slice(p, end).trimEnd();
      const loc = scanner.locate(p);
      token.payload = {
        text: payloadText,
        line: loc.line,
        column: loc.column,
        startOffset: p,
        delimited: true,
      };
      token.endOffset = p + payloadText.length;
      if (scan.error) token.delimiterError = scan.error;
      pos = end;
    } else if (
      p < text.length &&
      text[p] !== '\n' &&
      text[p] !== '\r' &&
      !isCommentStart(text, p) &&
      !text.startsWith('/*', p)
    ) {
      // ---- Scalar payload: rest of line ----
      const eol = scanner.endOfLine(p);
      const payloadText = stripTrailingComment(text.slice(p, eol));
      if (payloadText.length > 0) {
        const loc = scanner.locate(p);
        token.payload = {
          text: payloadText,
          line: loc.line,
          column: loc.column,
          startOffset: p,
          delimited: false,
        };
        token.endOffset = p + payloadText.length;
      }
      pos = eol;
    }

    tokens.push(token);
  }

  return { tokens, stray };
}
