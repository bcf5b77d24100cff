// ============================================================================
// @mxqlint/core - Type Definitions
// ============================================================================
//
// Central type definitions for the analysis pipeline.
// Values, commands, queries, issues and reports are shared by the
// tokenizer, parser, assembler and every rule pass.
// ============================================================================

// ---- Payload Values ----

/** How an object key or string literal was written in the source text. */
export type QuoteStyle = 'bare' | 'single' | 'double';

export interface ObjectEntry {
  key: string;
  keyStyle: QuoteStyle;
  value: Value;
}

export interface ObjectValue {
  kind: 'object';
  /** Entries in source order. Keys are unique within one object. */
  entries: readonly ObjectEntry[];
}

export interface ArrayValue {
  kind: 'array';
  items: readonly Value[];
}

export interface StringValue {
  kind: 'string';
  value: string;
  quote: 'single' | 'double';
}

export interface NumberValue {
  kind: 'number';
  value: number;
  /** Literal as written, e.g. `1e3` or `80.0`. */
  raw: string;
}

export interface BooleanValue {
  kind: 'boolean';
  value: boolean;
}

/** Unquoted word accepted as a string literal (`db_x`, `cpu(xos)`, `$category`). */
export interface BareValue {
  kind: 'bare';
  value: string;
}

export interface NullValue {
  kind: 'null';
}

/** Parsed payload tree. */
export type Value =
  | ObjectValue
  | ArrayValue
  | StringValue
  | NumberValue
  | BooleanValue
  | BareValue
  | NullValue;

export type ValueKind = Value['kind'];

// ---- Commands & Queries ----

/**
 * Role a command keyword plays in the pipeline.
 * Rule passes reason about roles, never about keywords.
 */
export type CommandRole =
  | 'source'
  | 'loader'
  | 'literal-row'
  | 'projection'
  | 'filter'
  | 'group'
  | 'aggregate'
  | 'order'
  | 'bound'
  | 'block-open'
  | 'block-close'
  | 'subquery-ref'
  | 'time-range'
  | 'transform';

/** Payload shapes a command accepts. Strings, numbers, booleans and bare words are all `scalar`. */
export type PayloadShape = 'object' | 'array' | 'scalar';

export interface ForbiddenKey {
  key: string;
  message: string;
  suggestion?: string;
}

/** Contract for one command keyword within a dialect. */
export interface CommandSpec {
  role: CommandRole;
  payload: 'required' | 'optional' | 'none';
  accepts: readonly PayloadShape[];
  /** Object keys whose values name fields (filter key, group pk, order key, ...). */
  fieldKeys?: readonly string[];
  /** Object keys naming the aggregate function. */
  functionKeys?: readonly string[];
  /** Object keys carrying a time-bucket duration. */
  timeKeys?: readonly string[];
  /** Object keys naming a block or category. */
  nameKeys?: readonly string[];
  /** Object keys naming a referenced subquery. */
  refKeys?: readonly string[];
  /** Object keys that introduce a new field further down the pipeline. */
  definesKeys?: readonly string[];
  /** Object keys holding the comparison literal of a filter. */
  compareKeys?: readonly string[];
  /** The command feeds rows into its scope. */
  suppliesData?: boolean;
  forbiddenKeys?: readonly ForbiddenKey[];
}

/** Style observation recorded while parsing a payload. */
export interface StyleNote {
  kind: 'unquoted-key' | 'trailing-separator';
  /** Offending key for `unquoted-key`, closing delimiter for `trailing-separator`. */
  detail: string;
  offset: number;
}

export interface Command {
  /** Document-order index across all scopes. */
  readonly index: number;
  /** Keyword as written. */
  readonly name: string;
  /** Upper-cased keyword used for dialect lookup. */
  readonly keyword: string;
  /** Undefined when the keyword is not part of the dialect. */
  readonly spec?: CommandSpec;
  readonly payload?: Value;
  readonly payloadText?: string;
  readonly payloadError?: string;
  readonly delimiterError?: string;
  readonly styleNotes: readonly StyleNote[];
  readonly line: number;
  readonly column: number;
  readonly startOffset: number;
  readonly endOffset: number;
  /** `null` for the top-level query, otherwise the enclosing subquery name. */
  readonly scope: string | null;
}

export interface SubqueryDefinition {
  readonly name: string;
  readonly query: Query;
  /** Index of the block-opening command in the parent scope. */
  readonly openerIndex: number;
  /** Index of the command that closed the block, or `-1` when it closed at end of input. */
  readonly closerIndex: number;
}

/** One scope: an ordered command list plus the blocks defined directly in it. */
export interface Query {
  readonly name: string | null;
  readonly commands: readonly Command[];
  /** Blocks in definition order. */
  readonly blocks: readonly SubqueryDefinition[];
  /** Name → definition. A later definition under the same name wins. */
  readonly subqueries: ReadonlyMap<string, SubqueryDefinition>;
}

// ---- Issues & Reports ----

export type Severity = 'critical' | 'warning' | 'info';

export type IssueCategory = 'structural' | 'semantic' | 'performance' | 'style';

export interface Issue {
  severity: Severity;
  category: IssueCategory;
  code: string;
  message: string;
  /** Document-order command index, `-1` for query-level issues. */
  commandIndex: number;
  /** 1-based source line, `0` when the issue has no location. */
  line: number;
  scope: string | null;
  suggestion?: string;
}

export interface SeveritySummary {
  critical: number;
  warning: number;
  info: number;
}

export interface ValidationReport {
  valid: boolean;
  issues: Issue[];
  summary: SeveritySummary;
  commandCount: number;
}

// ---- Field References & Synthetic Data ----

export type FieldRole = 'select' | 'filter' | 'group' | 'update' | 'order';

export interface FieldReference {
  name: string;
  role: FieldRole;
  commandIndex: number;
  line: number;
  scope: string | null;
}

export type FieldType = 'number' | 'string';

export type SyntheticValue = number | string;

export type SyntheticRow = Record<string, SyntheticValue>;

// ---- Category Metadata Collaborator ----

export interface CategoryField {
  fieldName: string;
  unit: string;
  type: string;
  description: string;
}

export type CategoryLookupResult =
  | { found: true; fields: CategoryField[] }
  | { found: false };

/**
 * External field catalog keyed by category name. Implementations are
 * expected to be fast; a thrown error is treated the same as "not found".
 */
export interface CategoryLookup {
  lookup(categoryName: string): CategoryLookupResult;
}
