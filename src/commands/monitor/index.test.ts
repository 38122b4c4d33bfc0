import type { Widgets } from 'blessed';
import { describe, expect, it, vi } from 'vitest';
import { hangingSource, makeRecord, staticSource } from '../../test/fixtures.js';
import { defaultConfig } from '../../types/config.js';
import { RenderError } from '../../utils/errors.js';
import { stripAnsi } from '../../utils/formatters.js';
import { Sampler } from '../../utils/process/sampler.js';
import type { ProcessSource } from '../../utils/process/types.js';
import type { MonitorScreen, Panel } from './components/screen-manager.js';
import { MonitorCommand } from './index.js';
import type { KeyName, SystemSummary } from './types.js';

class FakePanel implements Panel {
  content = '';
  visible: boolean;

  constructor(options: Widgets.BoxOptions) {
    this.content = options.content ?? '';
    this.visible = !options.hidden;
  }

  setContent(content: string): void {
    this.content = content;
  }

  setLabel(): void {}

  show(): void {
    this.visible = true;
  }

  hide(): void {
    this.visible = false;
  }

  setFront(): void {}
}

class FakeScreen implements MonitorScreen {
  readonly width = 120;
  readonly height = 30;
  readonly panels: FakePanel[] = [];
  renders = 0;
  failRenderAfter = Infinity;
  destroyed = false;
  private keyHandler: ((key: KeyName) => void) | null = null;

  initialize(): void {}

  createBox(options: Widgets.BoxOptions): Panel {
    const panel = new FakePanel(options);
    this.panels.push(panel);
    return panel;
  }

  onKey(handler: (key: KeyName) => void): void {
    this.keyHandler = handler;
  }

  onResize(): void {}

  render(): void {
    this.renders++;
    if (this.renders > this.failRenderAfter) {
      throw new Error('terminal went away');
    }
  }

  log(): void {}

  destroy(): void {
    this.destroyed = true;
  }

  press(key: KeyName): void {
    this.keyHandler?.(key);
  }

  text(): string {
    return this.panels
      .filter(panel => panel.visible)
      .map(panel => stripAnsi(panel.content))
      .join('\n');
  }
}

const summary: SystemSummary = {
  cpuCount: 8,
  cpuLoadPercent: 23.5,
  totalMemory: 16 * 1024 ** 3,
  usedMemory: 6 * 1024 ** 3,
  memoryPercent: 37.5,
  uptimeSeconds: 120,
  disk: null,
  temperature: null
};

function createMonitor(source: ProcessSource) {
  const screen = new FakeScreen();
  const command = new MonitorCommand({
    config: { ...defaultConfig, refreshIntervalMs: 60_000 },
    sampler: new Sampler({ source, timeoutMs: 60_000 }),
    screen,
    readSummary: async () => summary
  });
  return { screen, command };
}

describe('MonitorCommand', () => {
  it('draws each snapshot and the system summary', async () => {
    const { screen, command } = createMonitor(staticSource([makeRecord(31, { name: 'worker', cpuPercent: 7 })]));

    const done = command.execute();
    await vi.waitFor(() => {
      expect(screen.text()).toContain('CPU: 23.5% of 8');
      expect(screen.text()).toContain('worker');
    });

    screen.press('q');
    await done;
    expect(screen.destroyed).toBe(true);
  });

  it('quits promptly while a sample is still in flight', async () => {
    const { source, aborted } = hangingSource();
    const { screen, command } = createMonitor(source);

    const done = command.execute();
    screen.press('q');
    await done;

    expect(aborted()).toBe(true);
    expect(screen.destroyed).toBe(true);
  });

  it('keeps running with a banner when the process table cannot be read', async () => {
    const { screen, command } = createMonitor(async () => {
      throw new Error('ps not found');
    });
    let settled = false;

    const done = command.execute().finally(() => {
      settled = true;
    });
    await vi.waitFor(() => {
      expect(screen.text()).toContain('⚠ Failed to read the process table: ps not found; showing the previous snapshot');
    });
    expect(settled).toBe(false);

    screen.press('q');
    await done;
    expect(screen.destroyed).toBe(true);
  });

  it('samples again on r', async () => {
    let reads = 0;
    const { screen, command } = createMonitor(async () => {
      reads++;
      return staticSource([makeRecord(1)])();
    });

    const done = command.execute();
    await vi.waitFor(() => expect(screen.text()).toContain('proc-1'));
    screen.press('r');
    await vi.waitFor(() => expect(reads).toBe(2));

    screen.press('q');
    await done;
  });

  it('fails with a RenderError when drawing breaks', async () => {
    const { screen, command } = createMonitor(staticSource([makeRecord(1)]));
    screen.failRenderAfter = 1;

    await expect(command.execute()).rejects.toThrow(new RenderError('Failed to draw the dashboard: terminal went away'));
    expect(screen.destroyed).toBe(true);
  });
});
