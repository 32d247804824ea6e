/**
 * Unit tests for duration parsing and formatting
 */

import { describe, it, expect } from 'vitest';
import { formatDuration, normalizeStartTime, parseDuration } from '../duration.js';

describe('formatDuration', () => {
  it('should format hours and minutes', () => {
    expect(formatDuration(3900)).toBe('1h 5m');
    expect(formatDuration(9000)).toBe('2h 30m');
  });

  it('should keep a zero minute part once there are hours', () => {
    expect(formatDuration(7200)).toBe('2h 0m');
  });

  it('should use minutes only under an hour', () => {
    expect(formatDuration(1800)).toBe('30m');
    expect(formatDuration(0)).toBe('0m');
  });

  it('should drop leftover seconds', () => {
    expect(formatDuration(3659)).toBe('1h 0m');
  });
});

describe('parseDuration', () => {
  it('should parse hours and minutes', () => {
    expect(parseDuration('2h 30m')).toBe(9000);
    expect(parseDuration('1h30m')).toBe(5400);
  });

  it('should parse fractional hours', () => {
    expect(parseDuration('1.5h')).toBe(5400);
    expect(parseDuration('0.25h')).toBe(900);
  });

  it('should parse minutes', () => {
    expect(parseDuration('90m')).toBe(5400);
  });

  it('should treat a bare number as minutes', () => {
    expect(parseDuration('45')).toBe(2700);
  });

  it('should ignore case and surrounding whitespace', () => {
    expect(parseDuration('  2H ')).toBe(7200);
  });

  it('should return null for text that is not a duration', () => {
    expect(parseDuration('')).toBeNull();
    expect(parseDuration('soon')).toBeNull();
    expect(parseDuration('2x')).toBeNull();
    expect(parseDuration('h')).toBeNull();
  });

  it('should return zero for a zero duration', () => {
    expect(parseDuration('0m')).toBe(0);
  });
});

describe('normalizeStartTime', () => {
  it('should append seconds to HH:MM', () => {
    expect(normalizeStartTime('09:30')).toBe('09:30:00');
  });

  it('should keep HH:MM:SS unchanged', () => {
    expect(normalizeStartTime('09:30:15')).toBe('09:30:15');
  });
});
