import { describe, it, expect } from 'vitest';
import {
  formatBytes,
  formatDuration,
  formatNumber,
  formatRelativeTime,
  formatScore,
  formatTimestamp,
  truncate,
} from '../src/ui/format.js';
import { T0 } from './helpers.js';

describe('format', () => {
  it('formats byte sizes', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(1536)).toBe('1.5 KB');
    expect(formatBytes(1024 * 1024)).toBe('1 MB');
    expect(formatBytes(1024 ** 6)).toBe('1048576 TB');
  });

  it('formats response times', () => {
    expect(formatDuration(null)).toBe('-');
    expect(formatDuration(0.12)).toBe('120ms');
    expect(formatDuration(12.5)).toBe('12.5s');
    expect(formatDuration(125)).toBe('2m 5s');
  });

  it('formats counts and scores', () => {
    expect(formatNumber(1234567)).toBe('1,234,567');
    expect(formatScore(0.94167)).toBe('94.2%');
  });

  it('truncates long strings', () => {
    expect(truncate('abcdef', 4)).toBe('abc…');
    expect(truncate('abc', 4)).toBe('abc');
  });

  it('formats timestamps', () => {
    expect(formatTimestamp(T0)).toBe('2023-11-14T22:13:20.000Z');
  });

  it('formats relative times', () => {
    expect(formatRelativeTime(T0, T0 + 30)).toBe('30s ago');
    expect(formatRelativeTime(T0, T0 + 125)).toBe('2m ago');
    expect(formatRelativeTime(T0, T0 + 7200)).toBe('2h ago');
    expect(formatRelativeTime(T0, T0 + 90_000)).toBe('1d ago');
    expect(formatRelativeTime(T0 + 5, T0)).toBe('0s ago');
  });
});
