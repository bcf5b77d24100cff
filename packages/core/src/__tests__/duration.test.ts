import { describe, expect, it } from 'vitest';
import { formatDuration, parseDuration } from '../duration.js';

describe('parseDuration', () => {
  it('reads unit suffixes', () => {
    expect(parseDuration('250ms')).toBe(250);
    expect(parseDuration('30s')).toBe(30_000);
    expect(parseDuration('5m')).toBe(300_000);
    expect(parseDuration('1.5h')).toBe(5_400_000);
    expect(parseDuration('1D')).toBe(86_400_000);
    expect(parseDuration('2w')).toBe(1_209_600_000);
  });

  it('treats bare numbers as milliseconds', () => {
    expect(parseDuration('60000')).toBe(60_000);
    expect(parseDuration({ kind: 'number', value: 1000, raw: '1000' })).toBe(1000);
    expect(parseDuration({ kind: 'string', value: '10m', quote: 'double' })).toBe(600_000);
  });

  it('rejects everything else', () => {
    expect(parseDuration('soon')).toBeUndefined();
    expect(parseDuration('0s')).toBeUndefined();
    expect(parseDuration('-5m')).toBeUndefined();
    expect(parseDuration({ kind: 'boolean', value: true })).toBeUndefined();
    expect(parseDuration(undefined)).toBeUndefined();
  });
});

describe('formatDuration', () => {
  it('uses the largest whole unit', () => {
    expect(formatDuration(86_400_000)).toBe('1d');
    expect(formatDuration(90_000)).toBe('90s');
    expect(formatDuration(7_200_000)).toBe('2h');
    expect(formatDuration(1500)).toBe('1500ms');
  });
});
