import { describe, expect, it } from 'vitest';
import { formatBytes, formatPercent, formatUptime, stripAnsi, truncate } from './formatters.js';

describe('formatBytes', () => {
  it('keeps small values in bytes', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(1023)).toBe('1023 B');
  });

  it('scales by 1024', () => {
    expect(formatBytes(1024)).toBe('1.0 KB');
    expect(formatBytes(1536)).toBe('1.5 KB');
    expect(formatBytes(5 * 1024 ** 3)).toBe('5.0 GB');
  });
});

describe('formatPercent', () => {
  it('uses one decimal by default', () => {
    expect(formatPercent(12.345)).toBe('12.3%');
    expect(formatPercent(7, 0)).toBe('7%');
  });
});

describe('formatUptime', () => {
  it('drops leading zero units', () => {
    expect(formatUptime(5)).toBe('5s');
    expect(formatUptime(123)).toBe('2m 3s');
    expect(formatUptime(3723)).toBe('1h 2m 3s');
    expect(formatUptime(93780.9)).toBe('1d 2h 3m');
  });
});

describe('truncate', () => {
  it('marks cut text with an ellipsis', () => {
    expect(truncate('postgres', 10)).toBe('postgres');
    expect(truncate('postgres', 5)).toBe('post…');
    expect(truncate('postgres', 1)).toBe('…');
    expect(truncate('postgres', 0)).toBe('');
  });
});

describe('stripAnsi', () => {
  it('removes color codes', () => {
    expect(stripAnsi('\x1b[1m\x1b[36mPID\x1b[39m\x1b[22m')).toBe('PID');
  });
});
