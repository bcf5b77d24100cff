import { afterEach, describe, expect, it } from 'vitest';
import { type LogEntry, debug, getLogLevel, onLog, setLogLevel, timer, warn } from '../logger.js';

describe('logger', () => {
  const initial = getLogLevel();
  afterEach(() => setLogLevel(initial));

  it('delivers entries at or above the current level to callbacks', () => {
    const entries: LogEntry[] = [];
    const unsubscribe = onLog((entry) => entries.push(entry));
    setLogLevel('warn');
    debug('hidden');
    warn('shown', { n: 1 });
    unsubscribe();
    warn('after unsubscribe');
    expect(entries.map((e) => [e.level, e.message, e.data])).toEqual([['warn', 'shown', { n: 1 }]]);
  });

  it('times a pass at debug level', () => {
    const entries: LogEntry[] = [];
    const unsubscribe = onLog((entry) => entries.push(entry));
    setLogLevel('debug');
    const elapsed = timer('parse').endWith({ commands: 3 });
    unsubscribe();
    expect(elapsed).toBeGreaterThanOrEqual(0);
    expect(entries).toHaveLength(1);
    expect(entries[0].message).toMatch(/^parse: \d+\.\d{2}ms$/);
    expect(entries[0].data).toMatchObject({ commands: 3 });
  });
});
