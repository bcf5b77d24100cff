// ============================================================================
// @mxqlint/cli - Command Dispatch
// ============================================================================
//
// Commands:
//   mxqlint validate  [files...]                 Lint queries (stdin when no file)
//   mxqlint fixture   [file] [--rows N] [--name NAME] [--description TEXT]
//   mxqlint fields    [file]                     List referenced fields and guessed types
//   mxqlint category  search|product|info|products|reindex
//
// Exit codes: 0 valid, 1 a critical issue (or an unknown category), 2 usage
// or configuration error.
// ============================================================================

import path from 'node:path';
import { CategoryCatalog, DEFAULT_LANGUAGE } from '@mxqlint/catalog';
import {
  ConfigError,
  DEFAULT_CONFIG,
  DIALECT_NAMES,
  type DialectName,
  type LintConfig,
  MxqlintError,
  buildFixture,
  extractFieldReferences,
  formatReport,
  inferFieldTypes,
  log,
  mergeConfig,
  parseConfig,
  parseDuration,
  parseQuery,
  resolveDialect,
  validateQuery,
} from '@mxqlint/core';
import yaml from 'js-yaml';
import {
  type OutputFormat,
  OUTPUT_FORMATS,
  fieldRows,
  fixtureData,
  formatFieldTable,
  isOutputFormat,
  renderData,
  sourcedReport,
} from './render.js';
import { type Palette, clr, createPalette, severityDecorator, supportsColor } from './ui.js';

/** Everything the CLI touches outside its own process state. */
export interface CliIO {
  cwd: string;
  env: Record<string, string | undefined>;
  isTTY: boolean;
  stdout(text: string): void;
  stderr(text: string): void;
  readStdin(): Promise<string>;
  readFile(file: string): string;
  exists(file: string): boolean;
}

/** Bad command line: unknown command or option, missing argument, unreadable input. */
export class UsageError extends MxqlintError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const EXIT_OK = 0;
export const EXIT_INVALID = 1;
export const EXIT_USAGE = 2;

/** Looked up in the working directory when `--config` is not given. */
export const RC_FILES = ['.mxqlintrc.yaml', '.mxqlintrc.yml', '.mxqlintrc.json'];

const VALUE_FLAGS = new Set([
  'format',
  'dialect',
  'config',
  'categories',
  'time-range',
  'rows',
  'name',
  'description',
  'lang',
  'limit',
]);
const SWITCHES = new Set(['no-color', 'color', 'help']);

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

// ============================================================================
// Argument parsing
// ============================================================================

export class ParsedArgs {
  readonly command: string | undefined;
  readonly positionals: string[];
  private readonly flags = new Map<string, string>();
  private readonly switches = new Set<string>();

  constructor(args: readonly string[]) {
    const positionals: string[] = [];
    for (let i = 0; i < args.length; i++) {
      const arg = args[i];
      if (arg === '--') {
        positionals.push(...args.slice(i + 1));
        break;
      }
      if (!arg.startsWith('--')) {
        positionals.push(arg);
        continue;
      }
      const name = arg.slice(2);
      if (SWITCHES.has(name)) {
        this.switches.add(name);
      } else if (VALUE_FLAGS.has(name)) {
        if (i + 1 >= args.length) throw new UsageError(`Option --${name} needs a value`);
        this.flags.set(name, args[++i]);
      } else {
        throw new UsageError(`Unknown option --${name}`);
      }
    }
    this.command = positionals.shift();
    this.positionals = positionals;
  }

  getFlag(name: string): string | undefined {
    return this.flags.get(name);
  }

  hasFlag(name: string): boolean {
    return this.switches.has(name);
  }
}

// ============================================================================
// Configuration
// ============================================================================

function isDialectName(value: string): value is DialectName {
  return DIALECT_NAMES.some((d) => d === value);
}

function loadConfigFile(io: CliIO, file: string): LintConfig {
  let text: string;
  try {
    text = io.readFile(file);
  } catch (e) {
    throw new ConfigError(`Cannot read configuration: ${errorMessage(e)}`, { source: file });
  }
  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (e) {
    throw new ConfigError(`Cannot parse configuration: ${errorMessage(e)}`, { source: file });
  }
  log.debug('configuration loaded', { file });
  return parseConfig(raw, file);
}

/** Defaults, then the config file, then command-line options. */
export function resolveConfig(argv: ParsedArgs, io: CliIO): LintConfig {
  let base = DEFAULT_CONFIG;
  const explicit = argv.getFlag('config');
  if (explicit !== undefined) {
    base = loadConfigFile(io, path.resolve(io.cwd, explicit));
  } else {
    const found = RC_FILES.map((name) => path.join(io.cwd, name)).find((file) => io.exists(file));
    if (found) base = loadConfigFile(io, found);
  }

  const dialectFlag = argv.getFlag('dialect');
  let dialect: DialectName | undefined;
  if (dialectFlag !== undefined) {
    if (!isDialectName(dialectFlag)) {
      throw new UsageError(`Unknown dialect '${dialectFlag}' (expected ${DIALECT_NAMES.join(' or ')})`);
    }
    dialect = dialectFlag;
  }

  const range = argv.getFlag('time-range');
  const timeRangeMs = range === undefined ? undefined : parseDuration(range);
  if (range !== undefined && timeRangeMs === undefined) {
    throw new UsageError(`Invalid --time-range '${range}' (expected a duration such as 30m, 6h or 1d)`);
  }

  const rows = argv.getFlag('rows');
  return mergeConfig(base, {
    dialect,
    timeRangeMs,
    sampleRows: rows === undefined ? undefined : Number(rows),
    categoriesDir: argv.getFlag('categories'),
  });
}

// ============================================================================
// Shared helpers
// ============================================================================

interface Context {
  argv: ParsedArgs;
  io: CliIO;
  config: LintConfig;
  format: OutputFormat;
  palette: Palette;
}

interface QueryInput {
  source: string;
  text: string;
}

function outputFormat(argv: ParsedArgs): OutputFormat {
  const format = argv.getFlag('format') ?? 'text';
  if (!isOutputFormat(format)) {
    throw new UsageError(`Unknown format '${format}' (expected ${OUTPUT_FORMATS.join(', ')})`);
  }
  return format;
}

function readInput(io: CliIO, file: string): QueryInput {
  try {
    return { source: file, text: io.readFile(path.resolve(io.cwd, file)) };
  } catch (e) {
    throw new UsageError(`Cannot read ${file}: ${errorMessage(e)}`);
  }
}

async function readInputs(ctx: Context, files: readonly string[]): Promise<QueryInput[]> {
  if (files.length === 0) return [{ source: '<stdin>', text: await ctx.io.readStdin() }];
  return files.map((file) => readInput(ctx.io, file));
}

async function readSingleInput(ctx: Context, command: string): Promise<QueryInput> {
  if (ctx.argv.positionals.length > 1) {
    throw new UsageError(`${command} takes at most one file`);
  }
  const [input] = await readInputs(ctx, ctx.argv.positionals);
  return input;
}

function openCatalog(ctx: Context, options: { rebuild?: boolean } = {}): CategoryCatalog {
  const dir = ctx.config.categoriesDir;
  if (dir === undefined) {
    throw new UsageError('No category directory: pass --categories <dir> or set categoriesDir in the configuration');
  }
  return new CategoryCatalog(path.resolve(ctx.io.cwd, dir), options);
}

function emit(ctx: Context, data: unknown, text: () => string): void {
  ctx.io.stdout(ctx.format === 'text' ? text() : renderData(data, ctx.format));
}

function withNewline(text: string): string {
  return text.endsWith('\n') ? text : `${text}\n`;
}

// ============================================================================
// validate
// ============================================================================

async function validateCommand(ctx: Context): Promise<number> {
  const { config, io, palette } = ctx;
  const inputs = await readInputs(ctx, ctx.argv.positionals);
  const categoryLookup = config.categoriesDir === undefined ? undefined : openCatalog(ctx);

  const results = inputs.map(({ source, text }) =>
    sourcedReport(
      source,
      validateQuery(text, {
        dialect: config.dialect,
        categoryLookup,
        timeRangeMs: config.timeRangeMs,
        granularityRatio: config.granularityRatio,
        disabledRules: config.disabledRules,
      }),
    ),
  );

  if (ctx.format === 'text') {
    const decorate = severityDecorator(palette);
    results.forEach((result, i) => {
      if (results.length > 1) {
        io.stdout(`${i > 0 ? '\n' : ''}${clr(palette, palette.bold, `${result.source}:`)}\n`);
      }
      io.stdout(formatReport(result, { decorate }));
    });
  } else {
    io.stdout(renderData(results.length === 1 ? results[0] : results, ctx.format));
  }

  return results.every((r) => r.valid) ? EXIT_OK : EXIT_INVALID;
}

// ============================================================================
// fixture / fields
// ============================================================================

async function fixtureCommand(ctx: Context): Promise<number> {
  const { text } = await readSingleInput(ctx, 'fixture');
  const doc = parseQuery(text, resolveDialect(ctx.config.dialect));
  const fixture = buildFixture(doc, {
    rows: ctx.config.sampleRows,
    blockName: ctx.argv.getFlag('name'),
    description: ctx.argv.getFlag('description'),
  });
  emit(ctx, fixtureData(fixture), () => withNewline(fixture.text));
  return EXIT_OK;
}

async function fieldsCommand(ctx: Context): Promise<number> {
  const { text } = await readSingleInput(ctx, 'fields');
  const doc = parseQuery(text, resolveDialect(ctx.config.dialect));
  const rows = fieldRows(extractFieldReferences(doc), inferFieldTypes(doc));
  emit(ctx, rows, () => formatFieldTable(rows));
  return EXIT_OK;
}

// ============================================================================
// category
// ============================================================================

function parseLimit(value: string | undefined): number {
  if (value === undefined) return 10;
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new UsageError(`Invalid --limit '${value}' (expected a positive integer)`);
  }
  return limit;
}

function requireArgument(value: string | undefined, usage: string): string {
  if (value === undefined || value.length === 0) throw new UsageError(`Usage: mxqlint category ${usage}`);
  return value;
}

function categoryCommand(ctx: Context): number {
  const { io, palette } = ctx;
  const [sub, ...rest] = ctx.argv.positionals;

  switch (sub) {
    case 'search': {
      const query = requireArgument(rest.join(' ').trim(), 'search <text> [--limit N]');
      const results = openCatalog(ctx).search(query, parseLimit(ctx.argv.getFlag('limit')));
      emit(ctx, results, () => {
        if (results.length === 0) return `No categories match '${query}'.\n`;
        const width = Math.max(...results.map((r) => r.categoryName.length));
        return results
          .map((r) => `${r.categoryName.padEnd(width)}  ${r.title}  ${clr(palette, palette.gray, `(${r.relevance})`)}\n`)
          .join('');
      });
      return EXIT_OK;
    }

    case 'product': {
      const product = requireArgument(rest[0], 'product <name>');
      const names = openCatalog(ctx).findByProduct(product);
      emit(ctx, names, () =>
        names.length === 0 ? `No categories for product '${product}'.\n` : names.map((n) => `${n}\n`).join(''),
      );
      return EXIT_OK;
    }

    case 'products': {
      const products = openCatalog(ctx).listProducts();
      emit(ctx, products, () => products.map((p) => `${p}\n`).join(''));
      return EXIT_OK;
    }

    case 'info': {
      const name = requireArgument(rest[0], 'info <category> [--lang CODE]');
      const meta = openCatalog(ctx).getCategoryInfo(name, ctx.argv.getFlag('lang') ?? DEFAULT_LANGUAGE);
      if (!meta) {
        io.stderr(`Unknown category '${name}'\n`);
        return EXIT_INVALID;
      }
      emit(ctx, meta, () => {
        const out = [`${clr(palette, palette.bold, meta.categoryName)}: ${meta.title}`];
        if (meta.interval !== '') out.push(`interval: ${meta.interval}`);
        if (meta.platforms.length > 0) out.push(`platforms: ${meta.platforms.join(', ')}`);
        const describe = (field: string, type: string, unit: string, description: string) => {
          const kind = unit ? `${type}, ${unit}` : type;
          return `  ${field} (${kind})${description ? ` ${description}` : ''}`;
        };
        if (meta.tags.length > 0) {
          out.push('tags:', ...meta.tags.map((t) => describe(t.tagName, t.type, t.unit, t.description)));
        }
        if (meta.fields.length > 0) {
          out.push('fields:', ...meta.fields.map((f) => describe(f.fieldName, f.type, f.unit, f.description)));
        }
        return `${out.join('\n')}\n`;
      });
      return EXIT_OK;
    }

    case 'reindex': {
      const catalog = openCatalog(ctx, { rebuild: true });
      const written = catalog.writeIndex();
      const count = Object.keys(catalog.index.categories).length;
      emit(ctx, { path: written, categories: count }, () => `Wrote ${written} (${count} categories)\n`);
      return EXIT_OK;
    }

    default:
      throw new UsageError(
        sub === undefined
          ? 'Usage: mxqlint category search|product|info|products|reindex'
          : `Unknown category command '${sub}'`,
      );
  }
}

// ============================================================================
// Entry
// ============================================================================

export function usage(palette: Palette): string {
  return `
  ${clr(palette, palette.bold, 'mxqlint')} - static analysis for MXQL queries

  Usage:
    mxqlint validate  [files...]                     Lint queries (reads stdin when no file is given)
    mxqlint fixture   [file] [--rows N] [--name NAME] [--description TEXT]
                                                     Inject a literal sample-data block
    mxqlint fields    [file]                         List referenced fields and guessed types
    mxqlint category  search <text> [--limit N]      Rank categories by keyword
    mxqlint category  product <name>                 Categories of a product (db, server, ...)
    mxqlint category  info <category> [--lang CODE]  Tags and fields of a category
    mxqlint category  products                       List products
    mxqlint category  reindex                        Rewrite category-index.json

  Options:
    --format text|json|yaml    Output format (default text)
    --dialect mxql|pipeline    Query dialect (default mxql)
    --config <file>            YAML or JSON configuration (default .mxqlintrc.yaml in the working directory)
    --categories <dir>         Category metadata directory; enables field checks
    --time-range <duration>    Range assumed when the query declares none, e.g. 6h
    --no-color                 Disable colors (also NO_COLOR=1)

  Exit codes: 0 valid, 1 critical issues found, 2 usage or configuration error
`;
}

/**
 * Run one CLI invocation and return its exit code.
 * Library errors become exit code 2; anything else propagates.
 */
export async function runCli(args: readonly string[], io: CliIO): Promise<number> {
  const palette = createPalette(supportsColor({ args, env: io.env, isTTY: io.isTTY }));

  try {
    const argv = new ParsedArgs(args);
    if (argv.hasFlag('help') || argv.command === 'help') {
      io.stdout(usage(palette));
      return EXIT_OK;
    }
    if (argv.command === undefined) {
      io.stderr(usage(palette));
      return EXIT_USAGE;
    }

    const ctx: Context = {
      argv,
      io,
      config: resolveConfig(argv, io),
      format: outputFormat(argv),
      palette,
    };

    switch (argv.command) {
      case 'validate':
        return await validateCommand(ctx);
      case 'fixture':
        return await fixtureCommand(ctx);
      case 'fields':
        return await fieldsCommand(ctx);
      case 'category':
        return categoryCommand(ctx);
      default:
        throw new UsageError(`Unknown command '${argv.command}' (run mxqlint --help)`);
    }
  } catch (e) {
    if (!(e instanceof MxqlintError)) throw e;
    io.stderr(`${clr(palette, palette.red, 'error:')} ${e.message}\n`);
    return EXIT_USAGE;
  }
}
