// ============================================================================
// @mxqlint/core - Relaxed Payload Parser
// ============================================================================
//
// Command payloads look like JSON but accept unquoted words as keys and
// values, single or double quotes, and trailing separators.
//
// ─── GRAMMAR ───────────────────────────────────────────────────────────────
//
//   payload  = value
//   value    = object | array | quoted | word
//   object   = "{" [ entry { "," entry } [ "," ] ] "}"
//   entry    = key ":" value
//   key      = quoted | word
//   array    = "[" [ value { "," value } [ "," ] ] "]"
//   quoted   = "'" { CHAR | ESCAPE } "'" | '"' { CHAR | ESCAPE } '"'
//   ESCAPE   = "\\" ( "n" | "r" | "t" | "\\" | "'" | '"' | "/" )
//   word     = WORDCHAR { WORDCHAR | "(" ... ")" }
//   WORDCHAR = any char except whitespace , : { } [ ] ' "
//
// ─── WORD CLASSIFICATION ───────────────────────────────────────────────────
//
//   true | false       → boolean
//   null               → null
//   numeric literal    → number
//   anything else      → bare identifier (string literal)
//
// ─── NOTES ─────────────────────────────────────────────────────────────────
//
//   Unquoted keys      → style note, value still accepted
//   Trailing ","       → style note, value still accepted
//   Duplicate key      → error (keys are unique within an object)
//   Trailing content   → error
// ============================================================================

import type { ObjectEntry, QuoteStyle, StyleNote, Value } from './types.js';
import { isNumericText } from './value.js';

export interface PayloadParseError {
  message: string;
  /** Offset into the payload text. */
  offset: number;
}

export type PayloadParseResult =
  | { ok: true; value: Value; notes: StyleNote[] }
  | { ok: false; error: PayloadParseError };

class PayloadSyntaxError extends Error {
  constructor(
    message: string,
    readonly offset: number,
  ) {
    super(message);
    this.name = 'PayloadSyntaxError';
  }
}

const WORD_STOP = new Set([',', ':', '{', '}', '[', ']', '"', "'"]);

function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r';
}

function describe(ch: string | undefined): string {
  if (ch === undefined) return 'end of payload';
  if (ch === '\n') return 'line break';
  return `'${ch}'`;
}

class PayloadParser {
  private pos = 0;
  private readonly notes: StyleNote[] = [];

  constructor(private readonly text: string) {}

  parse(): PayloadParseResult {
    try {
      this.skipWhitespace();
      const value = this.parseValue();
      this.skipWhitespace();
      if (this.pos < this.text.length) {
        throw new PayloadSyntaxError(
          `Unexpected content after payload: ${describe(this.peek())}`,
          this.pos,
        );
      }
      return { ok: true, value, notes: this.notes };
    } catch (e) {
      if (e instanceof PayloadSyntaxError) {
        return { ok: false, error: { message: e.message, offset: e.offset } };
      }
      throw e;
    }
  }

  private peek(): string | undefined {
    return this.pos < this.text.length ? this.text[this.pos] : undefined;
  }

  private skipWhitespace(): void {
    while (this.pos < this.text.length && isWhitespace(this.text[this.pos])) {
      this.pos++;
    }
  }

  private parseValue(): Value {
    const ch = this.peek();
    if (ch === '{') return this.parseObject();
    if (ch === '[') return this.parseArray();
    if (ch === '"' || ch === "'") {
      const { text, style } = this.parseQuoted();
      return { kind: 'string', value: text, quote: style === 'single' ? 'single' : 'double' };
    }
    const start = this.pos;
    const word = this.parseWord();
    if (word.length === 0) {
      throw new PayloadSyntaxError(`Expected a value but found ${describe(ch)}`, start);
    }
    return classifyWord(word);
  }

  private parseObject(): Value {
    const open = this.pos;
    this.pos++; // {
    const entries: ObjectEntry[] = [];
    const seen = new Set<string>();

    this.skipWhitespace();
    if (this.peek() === '}') {
      this.pos++;
      return { kind: 'object', entries };
    }

    for (;;) {
      this.skipWhitespace();
      const keyOffset = this.pos;
      const { text: key, style: keyStyle } = this.parseKey();
      if (seen.has(key)) {
        throw new PayloadSyntaxError(`Duplicate key '${key}'`, keyOffset);
      }
      seen.add(key);
      if (keyStyle === 'bare') {
        this.notes.push({ kind: 'unquoted-key', detail: key, offset: keyOffset });
      }

      this.skipWhitespace();
      if (this.peek() !== ':') {
        throw new PayloadSyntaxError(
          `Expected ':' after key '${key}' but found ${describe(this.peek())}`,
          this.pos,
        );
      }
      this.pos++;
      this.skipWhitespace();
      const value = this.parseValue();
      entries.push({ key, keyStyle, value });

      this.skipWhitespace();
      const next = this.peek();
      if (next === '}') {
        this.pos++;
        return { kind: 'object', entries };
      }
      if (next !== ',') {
        if (next === undefined) {
          throw new PayloadSyntaxError("Unclosed '{'", open);
        }
        throw new PayloadSyntaxError(`Expected ',' or '}' but found ${describe(next)}`, this.pos);
      }
      const commaOffset = this.pos;
      this.pos++;
      this.skipWhitespace();
      if (this.peek() === '}') {
        this.notes.push({ kind: 'trailing-separator', detail: '}', offset: commaOffset });
        this.pos++;
        return { kind: 'object', entries };
      }
    }
  }

  private parseArray(): Value {
    const open = this.pos;
    this.pos++; // [
    const items: Value[] = [];

    this.skipWhitespace();
    if (this.peek() === ']') {
      this.pos++;
      return { kind: 'array', items };
    }

    for (;;) {
      this.skipWhitespace();
      items.push(this.parseValue());
      this.skipWhitespace();
      const next = this.peek();
      if (next === ']') {
        this.pos++;
        return { kind: 'array', items };
      }
      if (next !== ',') {
        if (next === undefined) {
          throw new PayloadSyntaxError("Unclosed '['", open);
        }
        throw new PayloadSyntaxError(`Expected ',' or ']' but found ${describe(next)}`, this.pos);
      }
      const commaOffset = this.pos;
      this.pos++;
      this.skipWhitespace();
      if (this.peek() === ']') {
        this.notes.push({ kind: 'trailing-separator', detail: ']', offset: commaOffset });
        this.pos++;
        return { kind: 'array', items };
      }
    }
  }

  private parseKey(): { text: string; style: QuoteStyle } {
    const ch = this.peek();
    if (ch === '"' || ch === "'") return this.parseQuoted();
    const start = this.pos;
    const word = this.parseWord();
    if (word.length === 0) {
      throw new PayloadSyntaxError(`Expected a key but found ${describe(ch)}`, start);
    }
    return { text: word, style: 'bare' };
  }

  private parseQuoted(): { text: string; style: QuoteStyle } {
    const start = this.pos;
    const quote = this.text[this.pos];
    this.pos++;
    let out = '';
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      if (ch === '\n') break;
      if (ch === quote) {
        this.pos++;
        return { text: out, style: quote === "'" ? 'single' : 'double' };
      }
      if (ch === '\\' && this.pos + 1 < this.text.length) {
        const esc = this.text[this.pos + 1];
        switch (esc) {
          case 'n':
            out += '\n';
            break;
          case 'r':
            out += '\r';
            break;
          case 't':
            out += '\t';
            break;
          default:
            out += esc;
        }
        this.pos += 2;
        continue;
      }
      out += ch;
      this.pos++;
    }
    throw new PayloadSyntaxError('Unterminated string literal', start);
  }

  /** Reads a bare word; balanced parentheses may enclose otherwise-stopping characters. */
  private parseWord(): string {
    const start = this.pos;
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      if (isWhitespace(ch) || WORD_STOP.has(ch)) break;
      if (ch === '(') {
        const open = this.pos;
        let depth = 0;
        while (this.pos < this.text.length) {
          const c = this.text[this.pos];
          if (c === '\n') break;
          if (c === '(') depth++;
          else if (c === ')') depth--;
          this.pos++;
          if (depth === 0) break;
        }
        if (depth !== 0) {
          throw new PayloadSyntaxError("Unclosed '('", open);
        }
        continue;
      }
      this.pos++;
    }
    return this.text.slice(start, this.pos);
  }
}

function classifyWord(word: string): Value {
  if (word === 'true') return { kind: 'boolean', value: true };
  if (word === 'false') return { kind: 'boolean', value: false };
  if (word === 'null') return { kind: 'null' };
  if (isNumericText(word)) {
    return { kind: 'number', value: Number(word), raw: word };
  }
  return { kind: 'bare', value: word };
}

/**
 * Parse one command payload.
 *
 * @example
 * ```ts
 * parsePayload('{key: "cpu", cmp: gt, value: 80}');
 * // { ok: true, value: { kind: 'object', entries: [...] }, notes: [3 × unquoted-key] }
 * ```
 */
export function parsePayload(text: string): PayloadParseResult {
  return new PayloadParser(text).parse();
}
