export type SortKey = 'cpu' | 'memory' | 'name' | 'pid';

export const SORT_KEYS: readonly SortKey[] = ['cpu', 'memory', 'name', 'pid'];

export type ProcessStatus = 'running' | 'sleeping' | 'stopped' | 'zombie' | 'idle' | 'unknown';

export interface ProcessRecord {
  readonly pid: number;
  readonly name: string;
  readonly cpuPercent: number;
  readonly memoryBytes: number;
  // Detail attributes, when the source provides them
  readonly ppid?: number;
  readonly status?: ProcessStatus;
  readonly user?: string;
  readonly command?: string;
  readonly memoryPercent?: number;
  readonly virtualMemoryBytes?: number;
  /** CPU time consumed so far, in seconds */
  readonly cpuTime?: number;
  readonly startedAt?: Date;
  /** Human-readable running time */
  readonly elapsed?: string;
}

export interface ProcessFailure {
  /** Undefined when the PID itself could not be read */
  readonly pid?: number;
  readonly reason: string;
}

export type ProcessEntry =
  | { readonly kind: 'record'; readonly record: ProcessRecord }
  | { readonly kind: 'failure'; readonly failure: ProcessFailure };

/**
 * Enumerates the live process table. Implementations report unreadable
 * processes as `failure` entries and only reject when the table as a whole
 * is unavailable. The signal is aborted when the caller stops waiting.
 */
export type ProcessSource = (signal?: AbortSignal) => Promise<ProcessEntry[]>;

export type ProcessSourceName = 'auto' | 'ps' | 'systeminformation';

export const PROCESS_SOURCE_NAMES: readonly ProcessSourceName[] = ['auto', 'ps', 'systeminformation'];

export interface Snapshot {
  readonly records: readonly ProcessRecord[];
  readonly failures: readonly ProcessFailure[];
  readonly omitted: number;
  readonly capturedAt: Date;
}

export function isSortKey(value: string): value is SortKey {
  return SORT_KEYS.some(key => key === value);
}

export function isProcessSourceName(value: string): value is ProcessSourceName {
  return PROCESS_SOURCE_NAMES.some(name => name === value);
}
