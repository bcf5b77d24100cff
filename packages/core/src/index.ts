// ============================================================================
// @mxqlint/core - Public API
// ============================================================================

// Validation
export { analyzeQuery, validateQuery, validateMany, resolveDialect } from './validate.js';
export type { AnalyzeOptions, Analysis } from './validate.js';

// Parsing
export { tokenize } from './tokenizer.js';
export type { CommandToken, RawPayload, StrayText, TokenizeResult } from './tokenizer.js';
export { parsePayload } from './payload_parser.js';
export type { PayloadParseError, PayloadParseResult } from './payload_parser.js';
export { parseQuery, scopesOf } from './assembler.js';
export type { ParsedDocument } from './assembler.js';

// Dialects
export { DIALECT_NAMES, getDialect, findCommandSpec } from './dialect.js';
export type { Dialect, DialectName, FixtureTemplates } from './dialect.js';
export { mxqlDialect } from './dialects/mxql.js';
export { pipelineDialect } from './dialects/pipeline.js';

// Passes
export { checkStructure } from './structural.js';
export { checkSemantics } from './semantic_rules.js';
export { checkFields } from './field_check.js';
export { checkPerformance, detectTimeRange, DEFAULT_GRANULARITY_RATIO } from './performance.js';
export type { PerformanceOptions } from './performance.js';
export { checkStyle } from './style.js';
export { aggregateIssues, buildReport, summarize, SEVERITY_RANK } from './issues.js';
export type { AggregateOptions } from './issues.js';

// Fields & fixtures
export { extractFieldReferences, inferFieldTypes, NUMERIC_FUNCTIONS } from './fields.js';
export {
  buildFixture,
  synthesizeRows,
  DEFAULT_BLOCK_NAME,
  DEFAULT_SAMPLE_ROWS,
} from './synthesizer.js';
export type { FixtureOptions, FixtureResult, SynthesisOptions, SynthesisResult } from './synthesizer.js';
export { parseDuration, formatDuration } from './duration.js';

// Output
export { formatReport, summaryLine } from './report.js';
export type { TextReportOptions } from './report.js';
export { toPlain, formatRow } from './value.js';

// Configuration
export { lintConfigSchema, parseConfig, mergeConfig, DEFAULT_CONFIG } from './config.js';
export type { LintConfig, LintConfigInput } from './config.js';

// Errors
export { MxqlintError, QueryInputError, ConfigError, CatalogError } from './errors.js';

// Logging
export { setLogLevel, getLogLevel, isDebugEnabled, onLog } from './logger.js';
export type { LogLevel, LogEntry, LogCallback } from './logger.js';
export * as log from './logger.js';

// Types
export type * from './types.js';
