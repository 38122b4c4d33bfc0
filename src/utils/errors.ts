/**
 * Error taxonomy shared by both modes.
 *
 * Per-process read failures are not errors here: they are recorded on the
 * snapshot (see `Snapshot.failures`) and never thrown.
 */
export class ProcPeekError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid command-line argument or environment override. */
export class UsageError extends ProcPeekError {}

/** The process table as a whole could not be read. */
export class SamplingError extends ProcPeekError {}

export class SamplingTimeoutError extends SamplingError {
  constructor(readonly timeoutMs: number) {
    super(`Sampling timed out after ${timeoutMs}ms`);
  }
}

export class SamplingAbortedError extends SamplingError {
  constructor() {
    super('Sampling was cancelled');
  }
}

/** The terminal is unavailable or could not be drawn to. */
export class RenderError extends ProcPeekError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Exit status for an error that reached the entry point. */
export function exitCodeFor(error: unknown): number {
  return error instanceof UsageError ? 2 : 1;
}
