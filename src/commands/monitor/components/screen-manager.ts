import blessed from 'blessed';
import type { Widgets } from 'blessed';
import { errorMessage, RenderError } from '../../../utils/errors.js';
import type { KeyName } from '../types.js';
import { normalizeKey } from './keys.js';

export interface ScreenOptions {
  debug: boolean;
}

/** The parts of a box the views draw through. */
export interface Panel {
  setContent(content: string): void;
  setLabel(label: string): void;
  show(): void;
  hide(): void;
  setFront(): void;
}

/** What the dashboard needs from the terminal. */
export interface MonitorScreen {
  initialize(options: ScreenOptions): void;
  createBox(options: Widgets.BoxOptions): Panel;
  onKey(handler: (key: KeyName) => void): void;
  onResize(handler: () => void): void;
  readonly width: number;
  readonly height: number;
  render(): void;
  log(message: string): void;
  destroy(): void;
}

export class ScreenManager implements MonitorScreen {
  private screen: Widgets.Screen | null = null;

  initialize(options: ScreenOptions): void {
    if (!process.stdout.isTTY) {
      throw new RenderError('Interactive mode requires a terminal (TTY); use "proc-peek list" instead');
    }
    try {
      this.screen = blessed.screen({
        smartCSR: true,
        title: 'proc-peek',
        fullUnicode: true,
        dockBorders: true,
        autoPadding: false,
        warnings: false,
        debug: options.debug,
        terminal: process.env.TERM || 'xterm-256color'
      });
    } catch (error) {
      throw new RenderError(`Could not open the terminal: ${errorMessage(error)}`, { cause: error });
    }
  }

  createBox(options: Widgets.BoxOptions): Widgets.BoxElement {
    return blessed.box({ parent: this.getScreen(), ...options });
  }

  onKey(handler: (key: KeyName) => void): void {
    this.getScreen().on('keypress', (ch: string | undefined, key: Widgets.Events.IKeyEventArg | undefined) => {
      const name = normalizeKey(ch, key);
      if (name !== null) {
        handler(name);
      }
    });
  }

  onResize(handler: () => void): void {
    this.getScreen().on('resize', handler);
  }

  get width(): number {
    const { width } = this.getScreen();
    return typeof width === 'number' ? width : 80;
  }

  get height(): number {
    const { height } = this.getScreen();
    return typeof height === 'number' ? height : 24;
  }

  render(): void {
    this.getScreen().render();
  }

  log(message: string): void {
    this.screen?.debug(message);
  }

  destroy(): void {
    if (this.screen) {
      this.screen.destroy();
      this.screen = null;
    }
  }

  private getScreen(): Widgets.Screen {
    if (!this.screen) {
      throw new RenderError('Screen not initialized');
    }
    return this.screen;
  }
}
