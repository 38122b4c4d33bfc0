import chalk from 'chalk';
import { formatBytes, formatPercent, formatUptime } from '../../../utils/formatters.js';
import type { MonitorScreen, Panel } from '../components/screen-manager.js';
import type { MonitorState, SystemSummary } from '../types.js';

export function renderSystemLine(summary: SystemSummary | null): string {
  if (!summary) {
    return 'System: reading...';
  }

  const parts = [
    `CPU: ${formatPercent(summary.cpuLoadPercent)} of ${summary.cpuCount}`,
    `Memory: ${formatBytes(summary.usedMemory)} / ${formatBytes(summary.totalMemory)} (${formatPercent(summary.memoryPercent)})`
  ];
  if (summary.disk) {
    const { disk } = summary;
    parts.push(`Disk ${disk.mount}: ${formatBytes(disk.usedBytes)} / ${formatBytes(disk.sizeBytes)} (${formatPercent(disk.percent)})`);
  }
  if (summary.temperature !== null) {
    parts.push(`Temp: ${summary.temperature.toFixed(0)}°C`);
  }
  parts.push(`Uptime: ${formatUptime(summary.uptimeSeconds)}`);
  return parts.join('  ');
}

export function renderHeaderLines(state: MonitorState, refreshIntervalMs: number): string[] {
  const parts = [
    chalk.bold.cyan('proc-peek'),
    `sort: ${chalk.yellow(state.view.sortKey)}`,
    `processes: ${state.snapshot ? state.snapshot.records.length : '-'}`
  ];
  if (state.snapshot && state.snapshot.omitted > 0) {
    parts.push(chalk.yellow(`unreadable: ${state.snapshot.omitted}`));
  }
  parts.push(chalk.gray(`refresh: ${refreshIntervalMs / 1000}s`));

  return [parts.join('  '), chalk.gray(renderSystemLine(state.summary))];
}

export class HeaderView {
  private header: Panel | null = null;
  private banner: Panel | null = null;

  constructor(private readonly screen: MonitorScreen, private readonly refreshIntervalMs: number) {}

  initialize(): void {
    this.header = this.screen.createBox({
      top: 0,
      left: 1,
      width: '100%-2',
      height: 2
    });
    this.banner = this.screen.createBox({
      top: 2,
      left: 1,
      width: '100%-2',
      height: 1,
      style: { fg: 'yellow' }
    });
  }

  update(state: MonitorState): void {
    this.header?.setContent(renderHeaderLines(state, this.refreshIntervalMs).join('\n'));
    this.banner?.setContent(state.banner ? `⚠ ${state.banner}` : '');
  }
}
