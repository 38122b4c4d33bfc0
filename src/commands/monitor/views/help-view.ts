import chalk from 'chalk';
import type { MonitorScreen, Panel } from '../components/screen-manager.js';

const KEY_HELP: Array<[string, string]> = [
  ['↑/k ↓/j', 'Move selection'],
  ['PgUp PgDn', 'Move selection by a page'],
  ['Home/g End/G', 'First / last row'],
  ['Enter', 'Show details of the selected process'],
  ['c m n p', 'Sort by CPU, memory, name, PID'],
  ['s', 'Cycle the sort key'],
  ['r', 'Refresh now'],
  ['?', 'Toggle this help'],
  ['q / Ctrl-C', 'Quit']
];

export function renderHelpLines(): string[] {
  return [
    ...KEY_HELP.map(([keys, action]) => `${chalk.cyan(keys.padEnd(14))}${action}`),
    '',
    chalk.gray('Press any key to close')
  ];
}

export class HelpView {
  private box: Panel | null = null;

  constructor(private readonly screen: MonitorScreen) {}

  initialize(): void {
    this.box = this.screen.createBox({
      top: 'center',
      left: 'center',
      width: 60,
      height: KEY_HELP.length + 4,
      hidden: true,
      label: ' Help ',
      border: { type: 'line' },
      content: renderHelpLines().join('\n'),
      style: {
        fg: 'white',
        bg: 'black',
        border: { fg: 'cyan' }
      },
      padding: { left: 1, right: 1 }
    });
  }

  setVisible(visible: boolean): void {
    if (!this.box) return;
    if (visible) {
      this.box.show();
      this.box.setFront();
    } else {
      this.box.hide();
    }
  }
}
