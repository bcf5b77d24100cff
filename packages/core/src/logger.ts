// ============================================================================
// @mxqlint/core - Logging & Observability
// ============================================================================

import process from 'node:process';

/**
 * Log levels for mxqlint.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log entry structure.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: Record<string, unknown>;
}

/**
 * Callback for log events.
 */
export type LogCallback = (entry: LogEntry) => void;

const callbacks: Set<LogCallback> = new Set();

/**
 * Current log level (controlled by MXQLINT_DEBUG env var).
 */
let currentLevel: LogLevel = 'info';

/**
 * Initialize log level from environment.
 */
function initLevel(): void {
  const debugEnv = process.env.MXQLINT_DEBUG;
  if (debugEnv === '1' || debugEnv === 'true') {
    currentLevel = 'debug';
  } else if (debugEnv === 'warn') {
    currentLevel = 'warn';
  } else if (debugEnv === 'error') {
    currentLevel = 'error';
  } else {
    currentLevel = 'info';
  }
}

initLevel();

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function shouldLog(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[currentLevel];
}

/**
 * Create a log entry and emit to stderr and callbacks.
 * Reports are written to stdout by the CLI, so log lines stay on stderr.
 */
function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    level,
    message,
    timestamp: new Date().toISOString(),
    data,
  };

  const dataStr = data ? ` ${JSON.stringify(data)}` : '';
  process.stderr.write(`[mxqlint] ${level}: ${message}${dataStr}\n`);

  for (const cb of callbacks) {
    try {
      cb(entry);
    } catch (e) {
      process.stderr.write(`[mxqlint] log callback error: ${String(e)}\n`);
    }
  }
}

/**
 * Debug-level logging (most verbose).
 * Only logs when MXQLINT_DEBUG=1 is set.
 */
export function debug(message: string, data?: Record<string, unknown>): void {
  log('debug', message, data);
}

export function info(message: string, data?: Record<string, unknown>): void {
  log('info', message, data);
}

/**
 * Warning-level logging (something unexpected but handled).
 */
export function warn(message: string, data?: Record<string, unknown>): void {
  log('warn', message, data);
}

export function error(message: string, data?: Record<string, unknown>): void {
  log('error', message, data);
}

// ---------------------------------------------------------------------------
// Performance Timing
// ---------------------------------------------------------------------------

/**
 * Performance timer for measuring pass duration.
 */
export class Timer {
  private startTime: number;
  private label: string;

  constructor(label: string) {
    this.label = label;
    this.startTime = performance.now();
  }

  end(): number {
    const duration = performance.now() - this.startTime;
    debug(`${this.label}: ${duration.toFixed(2)}ms`, { durationMs: duration });
    return duration;
  }

  endWith(data: Record<string, unknown>): number {
    const duration = performance.now() - this.startTime;
    debug(`${this.label}: ${duration.toFixed(2)}ms`, { ...data, durationMs: duration });
    return duration;
  }
}

export function timer(label: string): Timer {
  return new Timer(label);
}

// ---------------------------------------------------------------------------
// Event Callbacks
// ---------------------------------------------------------------------------

/**
 * Register a callback for log events. Returns an unsubscribe function.
 */
export function onLog(callback: LogCallback): () => void {
  callbacks.add(callback);
  return () => callbacks.delete(callback);
}

// ---------------------------------------------------------------------------
// Specific Log Events
// ---------------------------------------------------------------------------

/**
 * Log the outcome of one validation call.
 */
export function logValidation(
  commandCount: number,
  issueCount: number,
  valid: boolean,
  durationMs: number,
): void {
  debug(`validate: ${durationMs.toFixed(2)}ms for ${commandCount} commands`, {
    commands: commandCount,
    issues: issueCount,
    valid,
    durationMs,
  });
}

/**
 * Log a category lookup that failed and was downgraded to an info issue.
 */
export function logLookupFailure(categoryName: string, reason: string): void {
  warn(`category lookup failed for ${categoryName}`, { category: categoryName, reason });
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isDebugEnabled(): boolean {
  return currentLevel === 'debug';
}
