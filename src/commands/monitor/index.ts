import type { ProcPeekConfig } from '../../types/config.js';
import { errorMessage, RenderError } from '../../utils/errors.js';
import type { Sampler } from '../../utils/process/sampler.js';
import { ScreenManager, type MonitorScreen } from './components/screen-manager.js';
import { RefreshLoop } from './services/refresh-loop.js';
import { readSystemSummary } from './services/system-summary.js';
import { createInitialState, detailRecord, reduce } from './state.js';
import type { KeyName, MonitorEvent, MonitorState, SystemSummary } from './types.js';
import { DetailView } from './views/detail-view.js';
import { HeaderView } from './views/header-view.js';
import { HelpView } from './views/help-view.js';
import { ProcessesView, rowLimitForHeight } from './views/processes-view.js';
import { StatusBarView } from './views/status-bar-view.js';

export interface MonitorCommandOptions {
  config: ProcPeekConfig;
  sampler: Sampler;
  screen?: MonitorScreen;
  readSummary?: () => Promise<SystemSummary>;
}

export class MonitorCommand {
  private readonly screen: MonitorScreen;
  private readonly readSummary: () => Promise<SystemSummary>;
  private readonly headerView: HeaderView;
  private readonly processesView: ProcessesView;
  private readonly detailView: DetailView;
  private readonly helpView: HelpView;
  private readonly statusBarView: StatusBarView;
  private readonly loop: RefreshLoop;

  private state: MonitorState;
  private settle: { resolve: () => void; reject: (error: unknown) => void } | null = null;
  private stopping = false;
  private summaryPending = false;

  constructor(private readonly options: MonitorCommandOptions) {
    const { config, sampler } = options;

    this.screen = options.screen ?? new ScreenManager();
    this.readSummary = options.readSummary ?? (() => readSystemSummary());

    this.headerView = new HeaderView(this.screen, config.refreshIntervalMs);
    this.processesView = new ProcessesView(this.screen);
    this.detailView = new DetailView(this.screen);
    this.helpView = new HelpView(this.screen);
    this.statusBarView = new StatusBarView(this.screen);

    this.state = createInitialState({ sortKey: config.defaultSort, rowLimit: 1, selectedPid: null });

    this.loop = new RefreshLoop({
      sampler,
      intervalMs: config.refreshIntervalMs,
      onSnapshot: snapshot => {
        if (snapshot.omitted > 0) {
          this.log(`${snapshot.omitted} process(es) could not be read: ${snapshot.failures.map(f => f.reason).join('; ')}`);
        }
        this.dispatch({ type: 'snapshot', snapshot });
        this.refreshSummary();
      },
      onSamplingError: error => {
        this.log(`Sampling failed: ${error.message}`);
        this.dispatch({ type: 'sampleFailed', message: `${error.message}; showing the previous snapshot` });
      },
      onFatal: error => this.stop(error)
    });
  }

  /** Runs the dashboard until the user quits. */
  async execute(): Promise<void> {
    this.screen.initialize({ debug: this.options.config.debug });
    const done = new Promise<void>((resolve, reject) => {
      this.settle = { resolve, reject };
    });

    try {
      this.headerView.initialize();
      this.processesView.initialize();
      this.statusBarView.initialize();
      this.helpView.initialize();
      this.detailView.initialize();

      this.screen.onKey(key => this.handleKey(key));
      this.screen.onResize(() => this.dispatch({ type: 'resize', rowLimit: rowLimitForHeight(this.screen.height) }));
      process.once('SIGTERM', this.onTerminate);

      this.state = reduce(this.state, { type: 'resize', rowLimit: rowLimitForHeight(this.screen.height) });
      this.render();
    } catch (error) {
      process.removeListener('SIGTERM', this.onTerminate);
      this.screen.destroy();
      throw error;
    }

    this.loop.start();
    return done;
  }

  private readonly onTerminate = () => this.dispatch({ type: 'key', key: 'q' });

  private handleKey(key: KeyName): void {
    if (key === 'r' && this.state.mode.kind === 'running') {
      this.log('Manual refresh');
      this.loop.refreshNow();
      return;
    }
    this.dispatch({ type: 'key', key });
  }

  private dispatch(event: MonitorEvent): void {
    if (this.stopping) return;

    this.state = reduce(this.state, event);
    if (this.state.mode.kind === 'exiting') {
      this.stop();
      return;
    }

    try {
      this.render();
    } catch (error) {
      this.stop(error);
    }
  }

  // One read at a time; a slow read skips the ticks that arrive meanwhile
  private refreshSummary(): void {
    if (this.summaryPending || this.stopping) return;
    this.summaryPending = true;

    this.readSummary()
      .then(
        summary => this.dispatch({ type: 'summary', summary }),
        (error: unknown) => this.log(`System summary unavailable: ${errorMessage(error)}`)
      )
      .finally(() => {
        this.summaryPending = false;
      });
  }

  private render(): void {
    try {
      const { state } = this;
      this.headerView.update(state);
      this.processesView.update(state);
      this.statusBarView.update(state.mode);
      this.helpView.setVisible(state.mode.kind === 'help');

      const record = detailRecord(state);
      if (record) {
        this.detailView.show(record);
      } else {
        this.detailView.hide();
      }

      this.screen.render();
    } catch (error) {
      if (error instanceof RenderError) throw error;
      throw new RenderError(`Failed to draw the dashboard: ${errorMessage(error)}`, { cause: error });
    }
  }

  /** Tears the dashboard down; a reason makes `execute` reject with it. */
  private stop(reason?: unknown): void {
    if (this.stopping) return;
    this.stopping = true;
    process.removeListener('SIGTERM', this.onTerminate);

    this.loop.stop().then(
      () => this.finish(reason),
      (error: unknown) => this.finish(reason ?? error)
    );
  }

  private finish(reason: unknown): void {
    this.screen.destroy();
    if (reason === undefined) {
      this.settle?.resolve();
    } else {
      this.settle?.reject(reason);
    }
  }

  private log(message: string): void {
    this.screen.log(message);
  }
}
