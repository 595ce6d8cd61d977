import { describe, expect, it } from 'vitest';
import { formatSize, formatTime } from './formatter';

describe('formatTime', () => {
  it('drops a zero seconds part', () => {
    expect(formatTime(300000)).toBe('5m');
  });

  it('formats mixed durations', () => {
    expect(formatTime(0)).toBe('0s');
    expect(formatTime(45000)).toBe('45s');
    expect(formatTime(90000)).toBe('1m 30s');
    expect(formatTime(3723000)).toBe('1h 2m 3s');
  });
});

describe('formatSize', () => {
  it('formats bytes with binary units', () => {
    expect(formatSize(0)).toBe('0 B');
    expect(formatSize(512)).toBe('512.00 B');
    expect(formatSize(1536)).toBe('1.50 KB');
    expect(formatSize(5 * 1024 * 1024)).toBe('5.00 MB');
  });
});
