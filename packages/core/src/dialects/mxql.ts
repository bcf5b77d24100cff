// ============================================================================
// @mxqlint/core - MXQL Dialect
// ============================================================================

import type { Dialect } from '../dialect.js';
import type { CommandSpec } from '../types.js';

const commands: Record<string, CommandSpec> = {
  CATEGORY: {
    role: 'source',
    payload: 'required',
    accepts: ['scalar', 'object'],
    nameKeys: ['category', 'name'],
  },
  TAGLOAD: {
    role: 'loader',
    payload: 'optional',
    accepts: ['object'],
    suppliesData: true,
  },
  'FLEX-LOAD': {
    role: 'loader',
    payload: 'required',
    accepts: ['object'],
    suppliesData: true,
  },
  OID: { role: 'filter', payload: 'required', accepts: ['array', 'scalar'] },
  SELECT: { role: 'projection', payload: 'required', accepts: ['array'] },
  FILTER: {
    role: 'filter',
    payload: 'required',
    accepts: ['object'],
    fieldKeys: ['key'],
    compareKeys: ['value'],
  },
  GROUP: {
    role: 'group',
    payload: 'required',
    accepts: ['object'],
    fieldKeys: ['pk'],
    timeKeys: ['timeunit'],
    forbiddenKeys: [
      {
        key: 'key',
        message: "GROUP uses 'key' parameter - should use 'pk' instead",
        suggestion: 'Use GROUP {pk: "field"} or GROUP {timeunit: "5m", pk: "field"}',
      },
      {
        key: 'value',
        message: "GROUP uses 'value' parameter - this is UPDATE syntax, not GROUP",
        suggestion:
          'GROUP uses special keywords (pk, timeunit, first, last, merge, etc.), not key-value pairs',
      },
    ],
  },
  UPDATE: {
    role: 'aggregate',
    payload: 'required',
    accepts: ['object'],
    fieldKeys: ['key'],
    functionKeys: ['value'],
  },
  ORDER: { role: 'order', payload: 'required', accepts: ['object'], fieldKeys: ['key'] },
  LIMIT: { role: 'bound', payload: 'required', accepts: ['scalar'] },
  CREATE: { role: 'transform', payload: 'required', accepts: ['object'], definesKeys: ['key'] },
  DELETE: { role: 'transform', payload: 'required', accepts: ['array'] },
  RENAME: { role: 'transform', payload: 'required', accepts: ['object'], definesKeys: ['dst'] },
  FORMAT: { role: 'transform', payload: 'required', accepts: ['object'] },
  UNFOLD: { role: 'transform', payload: 'required', accepts: ['array'] },
  JOIN: { role: 'subquery-ref', payload: 'required', accepts: ['object'], refKeys: ['query'] },
  APPEND: {
    role: 'subquery-ref',
    payload: 'required',
    accepts: ['object'],
    refKeys: ['query'],
    suppliesData: true,
  },
  SUB: { role: 'block-open', payload: 'required', accepts: ['object', 'scalar'], nameKeys: ['id'] },
  END: { role: 'block-close', payload: 'none', accepts: [] },
  ADDROW: { role: 'literal-row', payload: 'required', accepts: ['object'], suppliesData: true },
  TIMEADD: { role: 'transform', payload: 'required', accepts: ['object'] },
  TIMEPAST: { role: 'time-range', payload: 'required', accepts: ['scalar'] },
  HVTEXT: { role: 'transform', payload: 'required', accepts: ['object'] },
};

export const mxqlDialect: Dialect = {
  name: 'mxql',
  commands,
  implicitFields: ['time', 'oid', 'oname', 'okind', 'okindName', 'onode', 'onodeName', 'pcode'],
  timeField: 'time',
  fixture: {
    openBlock: (name) => `SUB {id: ${name}}`,
    row: (rowText) => `ADDROW ${rowText}`,
    closeBlock: () => 'END',
    reference: (name) => `APPEND {query: ${name}}`,
  },
};
