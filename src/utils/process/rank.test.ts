import { describe, expect, it } from 'vitest';
import { makeRecord } from '../../test/fixtures.js';
import { nextSortKey, rank } from './rank.js';
import { SORT_KEYS } from './types.js';

const records = [
  makeRecord(30, { name: 'zsh', cpuPercent: 5, memoryBytes: 2048 }),
  makeRecord(12, { name: 'Node', cpuPercent: 40, memoryBytes: 8192 }),
  makeRecord(7, { name: 'bash', cpuPercent: 5, memoryBytes: 8192 }),
  makeRecord(21, { name: 'node', cpuPercent: 0.5, memoryBytes: 1024 }),
  makeRecord(3, { name: 'Xorg', cpuPercent: 5, memoryBytes: 4096 })
];

const pids = (list: { pid: number }[]) => list.map(record => record.pid);

describe('rank', () => {
  it('orders by cpu descending with ties broken by ascending pid', () => {
    expect(pids(rank(records, 'cpu'))).toEqual([12, 3, 7, 30, 21]);
  });

  it('orders by memory descending with ties broken by ascending pid', () => {
    expect(pids(rank(records, 'memory'))).toEqual([7, 12, 3, 30, 21]);
  });

  it('orders by name case-insensitively with ties broken by ascending pid', () => {
    expect(pids(rank(records, 'name'))).toEqual([7, 12, 21, 3, 30]);
  });

  it('orders by pid ascending', () => {
    expect(pids(rank(records, 'pid'))).toEqual([3, 7, 12, 21, 30]);
  });

  it.each(SORT_KEYS)('returns a permutation of the input when sorting by %s', key => {
    const ranked = rank(records, key, records.length);
    expect(ranked).toHaveLength(records.length);
    expect(new Set(ranked)).toEqual(new Set(records));
  });

  it.each(SORT_KEYS)('is idempotent when sorting by %s', key => {
    const once = rank(records, key);
    expect(rank(once, key)).toEqual(once);
  });

  it.each(SORT_KEYS)('truncates to a prefix of the full ranking when sorting by %s', key => {
    const full = rank(records, key, records.length);
    expect(rank(records, key, 3)).toEqual(full.slice(0, 3));
  });

  it('returns every record when the limit exceeds the input size', () => {
    expect(rank(records, 'pid', 50)).toHaveLength(5);
  });

  it('does not mutate its input', () => {
    const input = [...records];
    rank(input, 'cpu', 2);
    expect(input).toEqual(records);
  });

  it('rejects negative and fractional limits', () => {
    expect(() => rank(records, 'cpu', -1)).toThrow(RangeError);
    expect(() => rank(records, 'cpu', 1.5)).toThrow(RangeError);
    expect(() => rank(records, 'cpu', Number.NaN)).toThrow(RangeError);
  });
});

describe('nextSortKey', () => {
  it('cycles through cpu, memory, name and pid', () => {
    expect(nextSortKey('cpu')).toBe('memory');
    expect(nextSortKey('memory')).toBe('name');
    expect(nextSortKey('name')).toBe('pid');
    expect(nextSortKey('pid')).toBe('cpu');
  });
});
