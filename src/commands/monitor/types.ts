import type { ProcessRecord, Snapshot, SortKey } from '../../utils/process/types.js';

// User-controlled display configuration, carried across ticks
export interface ViewState {
  sortKey: SortKey;
  rowLimit: number;
  selectedPid: number | null;
}

export type MonitorMode =
  | { kind: 'running' }
  | { kind: 'help' }
  | { kind: 'detail'; pid: number }
  | { kind: 'exiting' };

export interface MonitorState {
  mode: MonitorMode;
  view: ViewState;
  snapshot: Snapshot | null;
  // Always rank(snapshot.records, view.sortKey, view.rowLimit)
  rows: ProcessRecord[];
  banner: string | null;
  summary: SystemSummary | null;
}

/**
 * Keys after normalisation: special keys by name (`up`, `enter`, `escape`,
 * ...), printable keys by character (`q`, `?`, `G`).
 */
export type KeyName = string;

export type MonitorEvent =
  | { type: 'snapshot'; snapshot: Snapshot }
  | { type: 'sampleFailed'; message: string }
  | { type: 'key'; key: KeyName }
  | { type: 'resize'; rowLimit: number }
  | { type: 'summary'; summary: SystemSummary };

export interface DiskUsage {
  mount: string;
  usedBytes: number;
  sizeBytes: number;
  percent: number;
}

export interface SystemSummary {
  cpuCount: number;
  cpuLoadPercent: number;
  totalMemory: number;
  usedMemory: number;
  memoryPercent: number;
  uptimeSeconds: number;
  // Root filesystem, or the system drive on Windows
  disk: DiskUsage | null;
  // Celsius, when the host exposes a sensor
  temperature: number | null;
}
