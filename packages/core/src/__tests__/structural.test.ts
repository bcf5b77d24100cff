import { describe, expect, it } from 'vitest';
import { parseQuery } from '../assembler.js';
import { getDialect } from '../dialect.js';
import { checkStructure } from '../structural.js';

const mxql = getDialect('mxql');
const pipeline = getDialect('pipeline');

function codes(text: string, dialect = pipeline): [string, number][] {
  return checkStructure(parseQuery(text, dialect)).map((i) => [i.code, i.commandIndex]);
}

describe('checkStructure', () => {
  it('reports nothing for balanced, parseable commands', () => {
    const text = 'SOURCE db_x\nLOAD {stime: 0}\nPROJECT [name, cpu]\nFILTER {key: cpu, value: 80}\nBOUND 10';
    expect(checkStructure(parseQuery(text, pipeline))).toEqual([]);
  });

  it('flags a missing required payload', () => {
    const issues = checkStructure(parseQuery('SOURCE\nLOAD', pipeline));
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatchObject({
      severity: 'critical',
      category: 'structural',
      code: 'missing-payload',
      message: 'SOURCE requires a payload',
      suggestion: 'Provide a single value or an object {...} after SOURCE',
      commandIndex: 0,
    });
  });

  it('flags an empty payload', () => {
    const issues = checkStructure(parseQuery('SOURCE x\nLOAD\nPROJECT []', pipeline));
    expect(issues.map((i) => i.message)).toEqual(['PROJECT payload is empty']);
  });

  it('flags a payload on a command that takes none', () => {
    expect(codes('SUB {id: t}\nADDROW {a: 1}\nEND 5', mxql)).toEqual([['unexpected-payload', 2]]);
  });

  it('flags a payload of the wrong shape', () => {
    const issues = checkStructure(parseQuery('CATEGORY x\nTAGLOAD\nSELECT {a: 1}', mxql));
    expect(issues.map((i) => [i.code, i.message])).toEqual([
      ['payload-kind-mismatch', 'SELECT expects a list [...] but got an object {...}'],
    ]);
  });

  it('reports payload parse errors with their column', () => {
    const issues = checkStructure(parseQuery('SOURCE x\nLOAD\nFILTER {key cpu}', pipeline));
    expect(issues.map((i) => [i.code, i.message])).toEqual([
      ['payload-parse-error', "Cannot parse FILTER payload: Expected ':' after key 'key' but found 'c' (payload column 6)"],
    ]);
  });

  it('reports unbalanced delimiters once per command', () => {
    const issues = checkStructure(parseQuery('FILTER {key:"cpu"\nPROJECT [name]', pipeline));
    expect(issues.map((i) => [i.code, i.commandIndex, i.message])).toEqual([
      ['unbalanced-delimiters', 0, "FILTER: Unclosed '{'"],
    ]);
  });

  it('flags an empty query', () => {
    expect(codes('')).toEqual([['empty-query', -1]]);
    expect(codes('# nothing but a comment\n')).toEqual([['empty-query', -1]]);
  });

  it('carries assembler issues', () => {
    expect(codes('SOURCE x\nLOAD\nEND')).toEqual([['unmatched-block-close', 2]]);
  });

  it('does not check payloads of unknown commands', () => {
    expect(codes('SOURCE x\nLOAD\nFROBNICATE')).toEqual([]);
  });
});
