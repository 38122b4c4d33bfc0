import type { ProcessEntry, ProcessRecord, ProcessSource } from '../utils/process/types.js';

export function makeRecord(pid: number, overrides: Partial<ProcessRecord> = {}): ProcessRecord {
  return {
    pid,
    name: `proc-${pid}`,
    cpuPercent: 0,
    memoryBytes: 0,
    ...overrides
  };
}

export function entriesOf(records: readonly ProcessRecord[]): ProcessEntry[] {
  return records.map(record => ({ kind: 'record', record }));
}

export function staticSource(records: readonly ProcessRecord[]): ProcessSource {
  return async () => entriesOf(records);
}

/** A source that never answers but honours its abort signal. */
export function hangingSource(): { source: ProcessSource; aborted: () => boolean } {
  let abortCount = 0;
  const source: ProcessSource = signal => new Promise<ProcessEntry[]>(() => {
    signal?.addEventListener('abort', () => {
      abortCount++;
    });
  });
  return { source, aborted: () => abortCount > 0 };
}
