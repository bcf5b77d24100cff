// ============================================================================
// @mxqlint/cli - Public API
// ============================================================================

export {
  runCli,
  resolveConfig,
  usage,
  ParsedArgs,
  UsageError,
  RC_FILES,
  EXIT_OK,
  EXIT_INVALID,
  EXIT_USAGE,
} from './commands.js';
export type { CliIO } from './commands.js';
export { renderData, fieldRows, formatFieldTable, fixtureData, isOutputFormat, OUTPUT_FORMATS } from './render.js';
export type { OutputFormat, FieldRow, FixtureData, SourcedReport } from './render.js';
export { createPalette, supportsColor, severityDecorator } from './ui.js';
export type { Palette } from './ui.js';
