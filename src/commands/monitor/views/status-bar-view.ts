import type { MonitorScreen, Panel } from '../components/screen-manager.js';
import type { MonitorMode } from '../types.js';

const RUNNING_HINTS = ' [q] Quit  [?] Help  [↑↓] Select  [Enter] Details  [c/m/n/p] Sort  [s] Cycle  [r] Refresh ';

export function statusHints(mode: MonitorMode): string {
  switch (mode.kind) {
    case 'help':
      return ' Press any key to close the help ';
    case 'detail':
      return ` Process ${mode.pid}  [Esc/Enter] Back  [q] Quit `;
    default:
      return RUNNING_HINTS;
  }
}

export class StatusBarView {
  private bar: Panel | null = null;

  constructor(private readonly screen: MonitorScreen) {}

  initialize(): void {
    this.bar = this.screen.createBox({
      bottom: 0,
      left: 0,
      width: '100%',
      height: 1,
      content: RUNNING_HINTS,
      style: {
        fg: 'cyan',
        bold: true
      }
    });
  }

  update(mode: MonitorMode): void {
    this.bar?.setContent(statusHints(mode));
  }
}
