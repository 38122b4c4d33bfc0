import { SamplingError } from '../../../utils/errors.js';
import type { Sampler } from '../../../utils/process/sampler.js';
import type { Snapshot } from '../../../utils/process/types.js';

export interface RefreshLoopOptions {
  sampler: Sampler;
  intervalMs: number;
  onSnapshot: (snapshot: Snapshot) => void;
  // The previous snapshot stays on screen; the loop keeps ticking
  onSamplingError: (error: SamplingError) => void;
  // Anything else thrown while handling a tick stops the loop
  onFatal: (error: unknown) => void;
}

/**
 * Drives sampling on a timer. The next tick is scheduled only once the
 * current sample settles, so samples never overlap.
 */
export class RefreshLoop {
  private timer: NodeJS.Timeout | null = null;
  private controller: AbortController | null = null;
  private inFlight: Promise<void> | null = null;
  private active = false;

  constructor(private readonly options: RefreshLoopOptions) {}

  get running(): boolean {
    return this.active;
  }

  start(): void {
    if (this.active) return;
    this.active = true;
    this.tick();
  }

  /** Samples immediately unless a sample is already in flight. */
  refreshNow(): void {
    if (!this.active || this.inFlight) return;
    this.clearTimer();
    this.tick();
  }

  /** Stops ticking and cancels the in-flight sample, if any. */
  async stop(): Promise<void> {
    this.active = false;
    this.clearTimer();
    this.controller?.abort();
    await this.inFlight;
  }

  private tick(): void {
    const controller = new AbortController();
    this.controller = controller;
    this.inFlight = this.options.sampler
      .sample(controller.signal)
      .then(
        snapshot => {
          if (this.active) this.options.onSnapshot(snapshot);
        },
        (error: unknown) => {
          // Cancelled by stop()
          if (!this.active) return;
          if (!(error instanceof SamplingError)) throw error;
          this.options.onSamplingError(error);
        }
      )
      .catch((error: unknown) => {
        this.active = false;
        this.options.onFatal(error);
      })
      .finally(() => {
        this.controller = null;
        this.inFlight = null;
        this.schedule();
      });
  }

  private schedule(): void {
    if (!this.active) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.tick();
    }, this.options.intervalMs);
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
