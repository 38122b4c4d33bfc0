import chalk from 'chalk';
import ora from 'ora';
import Table from 'cli-table3';
import type { ProcessRecord, SortKey } from './process/types.js';
import { formatBytes, truncate } from './formatters.js';

const SORT_COLUMN: Record<SortKey, number> = {
  pid: 0,
  cpu: 1,
  memory: 2,
  name: 4
};

export class UIHelper {
  static createSpinner(text: string) {
    return ora({
      text: chalk.cyan(text),
      spinner: 'dots12'
    });
  }

  static showProcessTable(records: readonly ProcessRecord[], title: string, sortKey: SortKey) {
    console.log();
    console.log(chalk.bold.yellow(title));
    console.log(this.buildProcessTable(records, sortKey));
  }

  static buildProcessTable(records: readonly ProcessRecord[], sortKey: SortKey): string {
    const terminalWidth = process.stdout.columns || 100;
    // PID + CPU% + MEM + MEM% + borders and padding
    const nameWidth = Math.max(20, Math.min(60, terminalWidth - 50));

    const head = ['PID', 'CPU%', 'MEM', 'MEM%', 'NAME'].map((label, index) =>
      index === SORT_COLUMN[sortKey] ? `${label} ▼` : label
    );

    const table = new Table({
      head,
      style: {
        head: ['cyan'],
        border: ['gray'],
        compact: true
      },
      colAligns: ['right', 'right', 'right', 'right', 'left']
    });

    for (const record of records) {
      table.push([
        String(record.pid),
        this.colorCpu(record.cpuPercent),
        formatBytes(record.memoryBytes),
        record.memoryPercent === undefined ? chalk.gray('-') : record.memoryPercent.toFixed(1),
        truncate(record.name, nameWidth)
      ]);
    }

    return table.toString();
  }

  static showError(message: string) {
    console.error(chalk.red(`\n✗ ${message}`));
  }

  static showWarning(message: string) {
    console.log(chalk.yellow(`\n⚠ ${message}`));
  }

  private static colorCpu(cpu: number): string {
    const text = cpu.toFixed(1);
    if (cpu >= 50) return chalk.red(text);
    if (cpu >= 20) return chalk.yellow(text);
    return chalk.green(text);
  }
}
