// ============================================================================
// @mxqlint/core - Generic Pipeline Dialect
// ============================================================================
//
// Vendor-neutral keywords for the same pipeline stages:
//   SOURCE db_x / LOAD / FILTER {key: cpu, cmp: gt, value: 80}
//   GROUP {by: host, interval: 5m} / AGGREGATE {target: cpu, fn: avg}
//   ORDER {key: cpu, dir: desc} / BOUND 10
// ============================================================================

import type { Dialect } from '../dialect.js';
import type { CommandSpec } from '../types.js';

const commands: Record<string, CommandSpec> = {
  SOURCE: {
    role: 'source',
    payload: 'required',
    accepts: ['scalar', 'object'],
    nameKeys: ['category', 'name'],
  },
  LOAD: { role: 'loader', payload: 'optional', accepts: ['object'], suppliesData: true },
  PROJECT: { role: 'projection', payload: 'required', accepts: ['array'] },
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
    fieldKeys: ['by', 'key'],
    timeKeys: ['interval'],
  },
  AGGREGATE: {
    role: 'aggregate',
    payload: 'required',
    accepts: ['object'],
    fieldKeys: ['target'],
    functionKeys: ['fn'],
  },
  ORDER: { role: 'order', payload: 'required', accepts: ['object', 'array', 'scalar'], fieldKeys: ['key'] },
  BOUND: { role: 'bound', payload: 'required', accepts: ['scalar'] },
  CREATE: { role: 'transform', payload: 'required', accepts: ['object'], definesKeys: ['key'] },
  RENAME: { role: 'transform', payload: 'required', accepts: ['object'], definesKeys: ['to'] },
  BLOCK: { role: 'block-open', payload: 'required', accepts: ['scalar', 'object'], nameKeys: ['name'] },
  END: { role: 'block-close', payload: 'none', accepts: [] },
  USE: {
    role: 'subquery-ref',
    payload: 'required',
    accepts: ['scalar', 'object'],
    refKeys: ['name'],
    suppliesData: true,
  },
  ROW: { role: 'literal-row', payload: 'required', accepts: ['object'], suppliesData: true },
  RANGE: { role: 'time-range', payload: 'required', accepts: ['scalar'] },
};

export const pipelineDialect: Dialect = {
  name: 'pipeline',
  commands,
  implicitFields: ['time'],
  timeField: 'time',
  fixture: {
    openBlock: (name) => `BLOCK ${name}`,
    row: (rowText) => `ROW ${rowText}`,
    closeBlock: () => 'END',
    reference: (name) => `USE ${name}`,
  },
};
