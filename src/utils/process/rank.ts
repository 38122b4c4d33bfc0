import { SORT_KEYS, type ProcessRecord, type SortKey } from './types.js';

type Comparator = (a: ProcessRecord, b: ProcessRecord) => number;

const byPid: Comparator = (a, b) => a.pid - b.pid;

function compareNames(a: ProcessRecord, b: ProcessRecord): number {
  const left = a.name.toLowerCase();
  const right = b.name.toLowerCase();
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

const COMPARATORS: Record<SortKey, Comparator> = {
  cpu: (a, b) => b.cpuPercent - a.cpuPercent || byPid(a, b),
  memory: (a, b) => b.memoryBytes - a.memoryBytes || byPid(a, b),
  name: (a, b) => compareNames(a, b) || byPid(a, b),
  pid: byPid
};

/**
 * Orders a snapshot's records by `sortKey` and keeps the first `limit`.
 * Every ordering ends in ascending PID, so the result is fully determined
 * by its input.
 */
export function rank(records: readonly ProcessRecord[], sortKey: SortKey, limit: number = Infinity): ProcessRecord[] {
  if (Number.isNaN(limit) || limit < 0 || (Number.isFinite(limit) && !Number.isInteger(limit))) {
    throw new RangeError(`Row limit must be a non-negative integer, got ${limit}`);
  }

  const ranked = [...records].sort(COMPARATORS[sortKey]);
  return Number.isFinite(limit) ? ranked.slice(0, limit) : ranked;
}

export function nextSortKey(current: SortKey): SortKey {
  return SORT_KEYS[(SORT_KEYS.indexOf(current) + 1) % SORT_KEYS.length];
}
