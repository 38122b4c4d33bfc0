import type { ProcessEntry } from './types.js';

interface CpuReading {
  cpuTime: number;
  at: number;
}

/**
 * Turns cumulative CPU time into current utilisation. A process seen in the
 * previous read gets the share of one core it used since then; a process
 * seen for the first time keeps the figure its source reported.
 */
export class CpuUsageTracker {
  private previous = new Map<number, CpuReading>();

  /** `at` is the read time in milliseconds. */
  apply(entries: readonly ProcessEntry[], at: number): ProcessEntry[] {
    const readings = new Map<number, CpuReading>();

    const updated = entries.map((entry): ProcessEntry => {
      if (entry.kind !== 'record' || entry.record.cpuTime === undefined) {
        return entry;
      }

      const { record } = entry;
      const cpuTime = entry.record.cpuTime;
      readings.set(record.pid, { cpuTime, at });

      const before = this.previous.get(record.pid);
      // A lower counter means the PID was reused
      if (!before || at <= before.at || cpuTime < before.cpuTime) {
        return entry;
      }

      const cpuPercent = ((cpuTime - before.cpuTime) * 1000 / (at - before.at)) * 100;
      return { kind: 'record', record: { ...record, cpuPercent } };
    });

    this.previous = readings;
    return updated;
  }
}
