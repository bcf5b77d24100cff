// ============================================================================
// @mxqlint/core - Error Types
// ============================================================================
//
// Analysis itself never throws for string input: problems in a query are
// reported as issues. These errors cover caller contract violations,
// configuration and catalog failures.
// ============================================================================

/**
 * Base error class for all mxqlint errors.
 */
export class MxqlintError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MxqlintError';
  }
}

// ---------------------------------------------------------------------------
// Input Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when the caller passes something other than query text.
 */
export class QueryInputError extends MxqlintError {
  public readonly received: string;

  constructor(received: unknown) {
    const kind = received === null ? 'null' : typeof received;
    super(`Query text must be a string, received ${kind}.`);
    this.name = 'QueryInputError';
    this.received = kind;
  }
}

// ---------------------------------------------------------------------------
// Configuration Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when configuration fails validation or names an unknown dialect.
 */
export class ConfigError extends MxqlintError {
  /** Dotted paths of the offending settings, e.g. `sampleRows`. */
  public readonly paths: string[];
  public readonly source?: string;

  constructor(message: string, options?: { paths?: string[]; source?: string }) {
    super(options?.source ? `${message} (${options.source})` : message);
    this.name = 'ConfigError';
    this.paths = options?.paths ?? [];
    this.source = options?.source;
  }
}

// ---------------------------------------------------------------------------
// Catalog Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when category metadata cannot be read or parsed.
 */
export class CatalogError extends MxqlintError {
  public readonly path: string;

  constructor(path: string, message: string) {
    super(`Category metadata error in ${path}: ${message}`);
    this.name = 'CatalogError';
    this.path = path;
  }
}
