import { describe, expect, it } from 'vitest';
import { parseQuery } from '../assembler.js';
import { getDialect } from '../dialect.js';
import { extractFieldReferences, inferFieldTypes } from '../fields.js';

const pipeline = getDialect('pipeline');
const mxql = getDialect('mxql');

const QUERY = [
  'SOURCE x',
  'LOAD',
  'PROJECT [name, cpu]',
  'FILTER {key: cpu, cmp: gt, value: 80}',
  'GROUP {by: host}',
  'AGGREGATE {target: mem, fn: avg}',
  'ORDER {key: mem}',
].join('\n');

describe('extractFieldReferences', () => {
  it('collects distinct fields with their first role and position', () => {
    const refs = extractFieldReferences(parseQuery(QUERY, pipeline));
    expect(refs.map((r) => [r.name, r.role, r.commandIndex, r.line])).toEqual([
      ['name', 'select', 2, 3],
      ['cpu', 'select', 2, 3],
      ['host', 'group', 4, 5],
      ['mem', 'update', 5, 6],
    ]);
  });

  it('walks every scope', () => {
    const doc = parseQuery('BLOCK b\nROW {x: 1}\nPROJECT [inner]\nEND\nSOURCE s\nLOAD\nORDER outer', pipeline);
    expect(extractFieldReferences(doc).map((r) => [r.name, r.role, r.scope])).toEqual([
      ['inner', 'select', 'b'],
      ['outer', 'order', null],
    ]);
  });

  it('skips wildcards and parameters but keeps function expressions', () => {
    const doc = parseQuery(
      'CATEGORY db_x\nTAGLOAD\nSELECT [oname, cpu(xos), "*", $extra]\nGROUP {pk: oname, timeunit: 5m}\nUPDATE {key: cpu, value: sum}',
      mxql,
    );
    expect(extractFieldReferences(doc).map((r) => [r.name, r.role])).toEqual([
      ['oname', 'select'],
      ['cpu(xos)', 'select'],
      ['cpu', 'update'],
    ]);
  });

  it('is stable under re-parsing', () => {
    const first = extractFieldReferences(parseQuery(QUERY, pipeline));
    const second = extractFieldReferences(parseQuery(QUERY, pipeline));
    expect(second).toEqual(first);
  });
});

describe('inferFieldTypes', () => {
  it('marks numerically compared and aggregated fields as numbers', () => {
    const types = inferFieldTypes(parseQuery(QUERY, pipeline));
    expect(Object.fromEntries(types)).toEqual({
      name: 'string',
      cpu: 'number',
      host: 'string',
      mem: 'number',
    });
  });

  it('reads quoted numeric literals as numbers', () => {
    const types = inferFieldTypes(parseQuery('SOURCE x\nLOAD\nFILTER {key: "cpu", cmp: "gt", value: "80"}', pipeline));
    expect(types.get('cpu')).toBe('number');
  });

  it('keeps text comparisons and parameters as strings', () => {
    const text = 'SOURCE x\nLOAD\nFILTER {key: state, value: high}\nFILTER {key: load, value: $limit}';
    const types = inferFieldTypes(parseQuery(text, pipeline));
    expect(types.get('state')).toBe('string');
    expect(types.get('load')).toBe('string');
  });

  it('ignores non-numeric aggregate functions', () => {
    const text = 'SOURCE x\nLOAD\nGROUP {by: h}\nAGGREGATE {target: host, fn: count}';
    expect(inferFieldTypes(parseQuery(text, pipeline)).get('host')).toBe('string');
  });
});
