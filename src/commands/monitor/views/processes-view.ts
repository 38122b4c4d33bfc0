import chalk from 'chalk';
import { formatBytes, truncate } from '../../../utils/formatters.js';
import type { ProcessRecord, SortKey } from '../../../utils/process/types.js';
import type { MonitorScreen, Panel } from '../components/screen-manager.js';
import type { MonitorState } from '../types.js';

const GAP = '  ';

interface Column {
  label: string;
  width: number;
  align: 'left' | 'right';
  sortKey?: SortKey;
}

const COLUMNS: Column[] = [
  { label: 'PID', width: 7, align: 'right', sortKey: 'pid' },
  { label: 'CPU%', width: 6, align: 'right', sortKey: 'cpu' },
  { label: 'MEM', width: 9, align: 'right', sortKey: 'memory' },
  { label: 'MEM%', width: 5, align: 'right' },
  { label: 'STATUS', width: 8, align: 'left' },
  { label: 'USER', width: 10, align: 'left' }
];

// Everything left of NAME, gaps included
const FIXED_WIDTH = COLUMNS.reduce((sum, column) => sum + column.width + GAP.length, 0);

function sortMark(label: string, active: boolean): string {
  return active ? `${label}▼` : label;
}

export function renderHeaderLine(sortKey: SortKey): string {
  const cells = COLUMNS.map(column => {
    const label = sortMark(column.label, column.sortKey === sortKey);
    return column.align === 'right' ? label.padStart(column.width) : label.padEnd(column.width);
  });
  cells.push(sortMark('NAME', sortKey === 'name'));
  return cells.join(GAP);
}

export function renderProcessLine(record: ProcessRecord, width: number): string {
  const nameWidth = Math.max(8, width - FIXED_WIDTH);
  return [
    String(record.pid).padStart(7),
    record.cpuPercent.toFixed(1).padStart(6),
    formatBytes(record.memoryBytes).padStart(9),
    (record.memoryPercent === undefined ? '-' : record.memoryPercent.toFixed(1)).padStart(5),
    (record.status ?? '-').padEnd(8),
    truncate(record.user ?? '-', 10).padEnd(10),
    truncate(record.name, nameWidth)
  ].join(GAP);
}

/** Table content: column header, then one line per ranked row. */
export function renderProcessLines(state: MonitorState, width: number): string[] {
  const lines = [chalk.bold.cyan(renderHeaderLine(state.view.sortKey))];

  if (!state.snapshot) {
    lines.push(chalk.gray('Sampling processes...'));
    return lines;
  }
  if (state.rows.length === 0) {
    lines.push(chalk.gray('No processes'));
    return lines;
  }

  for (const record of state.rows) {
    const line = renderProcessLine(record, width);
    lines.push(record.pid === state.view.selectedPid ? chalk.inverse(line) : line);
  }
  return lines;
}

export class ProcessesView {
  private box: Panel | null = null;

  constructor(private readonly screen: MonitorScreen) {}

  initialize(): void {
    this.box = this.screen.createBox({
      top: 3,
      left: 0,
      width: '100%',
      bottom: 1,
      label: ' Processes ',
      border: { type: 'line' },
      style: {
        fg: 'white',
        border: { fg: 'gray' }
      },
      padding: { left: 1, right: 1 }
    });
  }

  update(state: MonitorState): void {
    if (!this.box) return;
    // Border and padding take two columns each side
    const width = Math.max(20, this.screen.width - 4);
    this.box.setContent(renderProcessLines(state, width).join('\n'));
  }
}

/** Rows that fit in the table box for a given terminal height. */
export function rowLimitForHeight(height: number): number {
  // header (2) + banner (1) + borders (2) + column header (1) + status bar (1)
  return Math.max(1, height - 7);
}
