import { describe, expect, it } from 'vitest';
import { parseQuery, scopesOf } from '../assembler.js';
import { getDialect } from '../dialect.js';

const mxql = getDialect('mxql');
const pipeline = getDialect('pipeline');

describe('parseQuery', () => {
  it('assigns document-order indexes and keyword specs', () => {
    const doc = parseQuery('category db_x\nTagLoad\nLIMIT 10', mxql);
    expect(doc.commands.map((c) => c.index)).toEqual([0, 1, 2]);
    expect(doc.commands.map((c) => c.keyword)).toEqual(['CATEGORY', 'TAGLOAD', 'LIMIT']);
    expect(doc.commands.map((c) => c.spec?.role)).toEqual(['source', 'loader', 'bound']);
    expect(doc.issues).toEqual([]);
  });

  it('registers a closed block in the parent scope', () => {
    const doc = parseQuery('SUB {id: t}\nADDROW {a: 1}\nEND\nAPPEND {query: t}', mxql);
    expect(doc.root.commands.map((c) => c.keyword)).toEqual(['SUB', 'APPEND']);
    const def = doc.root.subqueries.get('t');
    expect(def?.openerIndex).toBe(0);
    expect(def?.closerIndex).toBe(2);
    expect(def?.query.commands.map((c) => c.keyword)).toEqual(['ADDROW', 'END']);
    expect(doc.commands[1].scope).toBe('t');
    expect(doc.commands[0].scope).toBeNull();
    expect(doc.issues).toEqual([]);
  });

  it('keeps sibling blocks in definition order', () => {
    const doc = parseQuery('BLOCK a\nROW {x: 1}\nEND\nBLOCK b\nROW {x: 2}\nEND', pipeline);
    expect(doc.root.blocks.map((b) => b.name)).toEqual(['a', 'b']);
    expect(scopesOf(doc).map((q) => q.name)).toEqual([null, 'a', 'b']);
  });

  it('flags a closer without an opener', () => {
    const doc = parseQuery('SOURCE x\nLOAD\nEND', pipeline);
    expect(doc.issues.map((i) => [i.code, i.commandIndex])).toEqual([['unmatched-block-close', 2]]);
    expect(doc.root.commands).toHaveLength(3);
  });

  it('closes an unclosed block at end of input', () => {
    const doc = parseQuery('BLOCK a\nROW {x: 1}', pipeline);
    expect(doc.issues.map((i) => [i.code, i.commandIndex, i.severity])).toEqual([
      ['unclosed-block', 0, 'critical'],
    ]);
    expect(doc.root.subqueries.get('a')?.closerIndex).toBe(-1);
  });

  it('closes the open block when another opener appears', () => {
    const doc = parseQuery('BLOCK a\nROW {x: 1}\nBLOCK b\nROW {x: 2}\nEND', pipeline);
    expect(doc.issues.map((i) => [i.code, i.commandIndex])).toEqual([['nested-block', 2]]);
    expect(doc.root.blocks.map((b) => [b.name, b.closerIndex])).toEqual([
      ['a', -1],
      ['b', 4],
    ]);
    expect(doc.commands[2].scope).toBeNull();
  });

  it('warns when a block name is defined twice', () => {
    const doc = parseQuery('BLOCK a\nROW {x: 1}\nEND\nBLOCK a\nROW {x: 2}\nEND', pipeline);
    expect(doc.issues.map((i) => [i.code, i.severity, i.commandIndex])).toEqual([
      ['duplicate-subquery', 'warning', 3],
    ]);
    expect(doc.root.subqueries.get('a')?.openerIndex).toBe(3);
  });

  it('requires a block name', () => {
    const doc = parseQuery('SUB {foo: bar}\nADDROW {a: 1}\nEND', mxql);
    expect(doc.issues.map((i) => i.code)).toEqual(['missing-block-name']);
    expect(doc.root.blocks).toHaveLength(1);
    expect(doc.root.subqueries.size).toBe(0);
  });

  it('keeps parsing after a broken payload', () => {
    const doc = parseQuery('FILTER {key:"cpu"\nPROJECT [name]', pipeline);
    expect(doc.commands).toHaveLength(2);
    expect(doc.commands[0].delimiterError).toBe("Unclosed '{'");
    expect(doc.commands[0].payload).toBeUndefined();
    expect(doc.commands[1].payload).toEqual({ kind: 'array', items: [{ kind: 'bare', value: 'name' }] });
  });

  it('reports stray text against the preceding command', () => {
    const doc = parseQuery('SOURCE x\n} junk\nLOAD', pipeline);
    expect(doc.issues).toEqual([
      {
        severity: 'critical',
        category: 'structural',
        code: 'stray-text',
        message: "Unexpected text '} junk' does not start a command",
        commandIndex: 0,
        line: 2,
        scope: null,
        suggestion: 'Start each command with its keyword, or comment the line out with #',
      },
    ]);
  });

  it('produces frozen results', () => {
    const doc = parseQuery('SOURCE x\nLOAD', pipeline);
    expect(Object.isFrozen(doc)).toBe(true);
    expect(Object.isFrozen(doc.commands)).toBe(true);
    expect(Object.isFrozen(doc.commands[0])).toBe(true);
  });
});
