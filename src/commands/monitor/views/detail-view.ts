import chalk from 'chalk';
import { formatBytes, formatElapsed, formatPercent, formatTimestamp } from '../../../utils/formatters.js';
import type { ProcessRecord } from '../../../utils/process/types.js';
import type { MonitorScreen, Panel } from '../components/screen-manager.js';

const LABEL_WIDTH = 13;

export function renderDetailLines(record: ProcessRecord): string[] {
  const rows: Array<[string, string | undefined]> = [
    ['PID', String(record.pid)],
    ['Name', record.name],
    ['Parent PID', record.ppid?.toString()],
    ['Status', record.status],
    ['User', record.user],
    ['CPU', formatPercent(record.cpuPercent)],
    ['CPU time', record.cpuTime === undefined ? undefined : formatElapsed(record.cpuTime)],
    ['Memory (RSS)', formatBytes(record.memoryBytes)],
    ['Virtual mem', record.virtualMemoryBytes === undefined ? undefined : formatBytes(record.virtualMemoryBytes)],
    ['Memory %', record.memoryPercent === undefined ? undefined : formatPercent(record.memoryPercent)],
    ['Started', record.startedAt && formatTimestamp(record.startedAt)],
    ['Running for', record.elapsed],
    ['Command', record.command]
  ];

  return rows.map(([label, value]) => `${chalk.bold(label.padEnd(LABEL_WIDTH))}${value ?? chalk.gray('-')}`);
}

export class DetailView {
  private box: Panel | null = null;

  constructor(private readonly screen: MonitorScreen) {}

  initialize(): void {
    this.box = this.screen.createBox({
      top: 'center',
      left: 'center',
      width: '70%',
      height: 17,
      hidden: true,
      border: { type: 'line' },
      style: {
        fg: 'white',
        bg: 'black',
        border: { fg: 'green' }
      },
      padding: { left: 1, right: 1 }
    });
  }

  show(record: ProcessRecord): void {
    if (!this.box) return;
    this.box.setLabel(` ${record.name} (${record.pid}) - Esc to close `);
    this.box.setContent(renderDetailLines(record).join('\n'));
    this.box.show();
    this.box.setFront();
  }

  hide(): void {
    this.box?.hide();
  }
}
