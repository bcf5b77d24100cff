import { describe, expect, it } from 'vitest';
import { parsePayload } from '../payload_parser.js';

describe('parsePayload', () => {
  it('accepts bare keys and values', () => {
    const result = parsePayload('{key: cpu, cmp: gt, value: 80}');
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toEqual({
      kind: 'object',
      entries: [
        { key: 'key', keyStyle: 'bare', value: { kind: 'bare', value: 'cpu' } },
        { key: 'cmp', keyStyle: 'bare', value: { kind: 'bare', value: 'gt' } },
        { key: 'value', keyStyle: 'bare', value: { kind: 'number', value: 80, raw: '80' } },
      ],
    });
    expect(result.notes.map((n) => n.detail)).toEqual(['key', 'cmp', 'value']);
  });

  it('accepts single and double quotes', () => {
    const result = parsePayload(`{'a': "x", "b": 'y'}`);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.notes).toEqual([]);
    expect(result.value).toEqual({
      kind: 'object',
      entries: [
        { key: 'a', keyStyle: 'single', value: { kind: 'string', value: 'x', quote: 'double' } },
        { key: 'b', keyStyle: 'double', value: { kind: 'string', value: 'y', quote: 'single' } },
      ],
    });
  });

  it('classifies literals', () => {
    const result = parsePayload('[true, false, null, -1.5, 1e3, $cat, cpu(xos)]');
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toEqual({
      kind: 'array',
      items: [
        { kind: 'boolean', value: true },
        { kind: 'boolean', value: false },
        { kind: 'null' },
        { kind: 'number', value: -1.5, raw: '-1.5' },
        { kind: 'number', value: 1000, raw: '1e3' },
        { kind: 'bare', value: '$cat' },
        { kind: 'bare', value: 'cpu(xos)' },
      ],
    });
  });

  it('decodes escapes', () => {
    const result = parsePayload("'it\\'s\\n'");
    expect(result.ok && result.value).toEqual({ kind: 'string', value: "it's\n", quote: 'single' });
  });

  it('parses a scalar word', () => {
    const result = parsePayload('db_postgresql_counter');
    expect(result.ok && result.value).toEqual({ kind: 'bare', value: 'db_postgresql_counter' });
  });

  it('tolerates trailing separators with a note', () => {
    const result = parsePayload('[a, b,]');
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.notes).toEqual([{ kind: 'trailing-separator', detail: ']', offset: 5 }]);
  });

  it('rejects duplicate keys', () => {
    const result = parsePayload('{a: 1, a: 2}');
    expect(result).toEqual({ ok: false, error: { message: "Duplicate key 'a'", offset: 7 } });
  });

  it('rejects content after the payload', () => {
    const result = parsePayload('{a: 1} extra');
    expect(result).toEqual({
      ok: false,
      error: { message: "Unexpected content after payload: 'e'", offset: 7 },
    });
  });

  it('rejects an unterminated string', () => {
    const result = parsePayload('{a: "x}');
    expect(result).toEqual({ ok: false, error: { message: 'Unterminated string literal', offset: 4 } });
  });

  it('rejects a missing colon', () => {
    const result = parsePayload('{a 1}');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe("Expected ':' after key 'a' but found '1'");
  });

  it('rejects an unclosed object', () => {
    const result = parsePayload('{a: 1');
    expect(result).toEqual({ ok: false, error: { message: "Unclosed '{'", offset: 0 } });
  });

  it('rejects an empty payload', () => {
    const result = parsePayload('');
    expect(result).toEqual({
      ok: false,
      error: { message: 'Expected a value but found end of payload', offset: 0 },
    });
  });
});
