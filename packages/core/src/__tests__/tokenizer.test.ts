import { describe, expect, it } from 'vitest';
import { keywordMatcher } from '../dialect.js';
import { mxqlDialect } from '../dialects/mxql.js';
import { pipelineDialect } from '../dialects/pipeline.js';
import { tokenize } from '../tokenizer.js';

const mxql = keywordMatcher(mxqlDialect);
const pipeline = keywordMatcher(pipelineDialect);

describe('tokenize', () => {
  it('splits commands with scalar and missing payloads', () => {
    const { tokens, stray } = tokenize('CATEGORY db_x\nTAGLOAD\nLIMIT 10', mxql);
    expect(tokens.map((t) => t.name)).toEqual(['CATEGORY', 'TAGLOAD', 'LIMIT']);
    expect(tokens[0].payload?.text).toBe('db_x');
    expect(tokens[1].payload).toBeUndefined();
    expect(tokens[2].payload?.text).toBe('10');
    expect(tokens[2].line).toBe(3);
    expect(tokens[2].column).toBe(1);
    expect(stray).toEqual([]);
  });

  it('captures a delimited payload over several lines', () => {
    const { tokens } = tokenize('FILTER {\n  key: cpu,\n  value: 80\n}\nLIMIT 5', mxql);
    expect(tokens).toHaveLength(2);
    expect(tokens[0].payload?.text).toBe('{\n  key: cpu,\n  value: 80\n}');
    expect(tokens[0].delimiterError).toBeUndefined();
    expect(tokens[1].name).toBe('LIMIT');
    expect(tokens[1].line).toBe(5);
  });

  it('tracks nested delimiters', () => {
    const { tokens } = tokenize('FLEX-LOAD {tags: [a, {b: [1, 2]}]}\nLIMIT 1', mxql);
    expect(tokens[0].name).toBe('FLEX-LOAD');
    expect(tokens[0].payload?.text).toBe('{tags: [a, {b: [1, 2]}]}');
    expect(tokens[1].name).toBe('LIMIT');
  });

  it('ignores delimiters inside quoted strings', () => {
    const { tokens } = tokenize("FILTER {key: name, value: 'a}b'}\nLIMIT 1", mxql);
    expect(tokens[0].payload?.text).toBe("{key: name, value: 'a}b'}");
    expect(tokens[0].delimiterError).toBeUndefined();
  });

  it('keeps a balanced payload whose item lines start with a keyword', () => {
    const { tokens, stray } = tokenize('CATEGORY db_x\nTAGLOAD\nSELECT [\n  oname,\n  oid\n]\nLIMIT 5', mxql);
    expect(tokens.map((t) => t.name)).toEqual(['CATEGORY', 'TAGLOAD', 'SELECT', 'LIMIT']);
    expect(tokens[2].payload?.text).toBe('[\n  oname,\n  oid\n]');
    expect(tokens[2].delimiterError).toBeUndefined();
    expect(tokens[3].line).toBe(7);
    expect(stray).toEqual([]);
  });

  it('keeps a balanced pipeline projection listing a keyword-named field', () => {
    const { tokens } = tokenize('SOURCE db_x\nLOAD\nPROJECT [\n  name,\n  load\n]\nBOUND 5', pipeline);
    expect(tokens.map((t) => t.name)).toEqual(['SOURCE', 'LOAD', 'PROJECT', 'BOUND']);
    expect(tokens[2].payload?.text).toBe('[\n  name,\n  load\n]');
    expect(tokens[2].delimiterError).toBeUndefined();
  });

  it('cuts an unclosed payload at the first keyword line', () => {
    const { tokens } = tokenize('SELECT [\n  oid\nLIMIT 5', mxql);
    expect(tokens.map((t) => t.name)).toEqual(['SELECT', 'oid', 'LIMIT']);
    expect(tokens[0].payload?.text).toBe('[');
    expect(tokens[0].delimiterError).toBe("Unclosed '['");
  });

  it('ends an unbalanced payload at the next command line', () => {
    const { tokens } = tokenize('FILTER {key:"cpu"\nPROJECT [name]', pipeline);
    expect(tokens).toHaveLength(2);
    expect(tokens[0].payload?.text).toBe('{key:"cpu"');
    expect(tokens[0].delimiterError).toBe("Unclosed '{'");
    expect(tokens[1].name).toBe('PROJECT');
    expect(tokens[1].payload?.text).toBe('[name]');
  });

  it('does not treat a keyword used as an object key as a command', () => {
    const { tokens } = tokenize('CREATE {\n  filter: 1\nLIMIT 3', mxql);
    expect(tokens.map((t) => t.name)).toEqual(['CREATE', 'LIMIT']);
    expect(tokens[0].payload?.text).toBe('{\n  filter: 1');
    expect(tokens[0].delimiterError).toBe("Unclosed '{'");
  });

  it('runs an unbalanced payload to end of input when no command follows', () => {
    const { tokens } = tokenize('SELECT [a, b', mxql);
    expect(tokens).toHaveLength(1);
    expect(tokens[0].payload?.text).toBe('[a, b');
    expect(tokens[0].delimiterError).toBe("Unclosed '['");
  });

  it('records a mismatched closer', () => {
    const { tokens } = tokenize('SELECT [a, b}\nLIMIT 3', mxql);
    expect(tokens).toHaveLength(2);
    expect(tokens[0].delimiterError).toBe("Mismatched delimiter: expected ']' but found '}'");
    expect(tokens[1].payload?.text).toBe('3');
  });

  it('skips comments', () => {
    const text = '# header\nCATEGORY x // trailing\n/* block\ncomment */\nTAGLOAD -- loader\nLIMIT 10 # top';
    const { tokens, stray } = tokenize(text, mxql);
    expect(tokens.map((t) => t.name)).toEqual(['CATEGORY', 'TAGLOAD', 'LIMIT']);
    expect(tokens[0].payload?.text).toBe('x');
    expect(tokens[1].payload).toBeUndefined();
    expect(tokens[2].payload?.text).toBe('10');
    expect(stray).toEqual([]);
  });

  it('keeps a comment marker inside quotes', () => {
    const { tokens } = tokenize("CATEGORY 'a #b'", mxql);
    expect(tokens[0].payload?.text).toBe("'a #b'");
  });

  it('reports text that cannot start a command', () => {
    const { tokens, stray } = tokenize('CATEGORY x\n  123 oops\nTAGLOAD', mxql);
    expect(tokens).toHaveLength(2);
    expect(stray).toEqual([{ text: '123 oops', line: 2, column: 3, offset: 13, afterToken: 0 }]);
  });

  it('records offsets for splicing', () => {
    const text = 'CATEGORY db_x\nTAGLOAD {stime: 1}';
    const { tokens } = tokenize(text, mxql);
    expect(text.slice(tokens[0].startOffset, tokens[0].endOffset)).toBe('CATEGORY db_x');
    expect(text.slice(tokens[1].startOffset, tokens[1].endOffset)).toBe('TAGLOAD {stime: 1}');
  });
});
