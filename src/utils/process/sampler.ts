import {
  errorMessage,
  SamplingAbortedError,
  SamplingError,
  SamplingTimeoutError
} from '../errors.js';
import type { ProcessEntry, ProcessFailure, ProcessRecord, ProcessSource, Snapshot } from './types.js';

export interface SamplerOptions {
  source: ProcessSource;
  timeoutMs: number;
  now?: () => Date;
}

export class Sampler {
  private readonly source: ProcessSource;
  private readonly timeoutMs: number;
  private readonly now: () => Date;

  constructor(options: SamplerOptions) {
    this.source = options.source;
    this.timeoutMs = options.timeoutMs;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Captures one snapshot. Rejects with `SamplingTimeoutError` once
   * `timeoutMs` elapses and with `SamplingAbortedError` as soon as `signal`
   * aborts; in both cases the source's own signal is aborted too.
   */
  async sample(signal?: AbortSignal): Promise<Snapshot> {
    if (signal?.aborted) {
      throw new SamplingAbortedError();
    }

    const controller = new AbortController();
    const onAbort = () => controller.abort(new SamplingAbortedError());
    signal?.addEventListener('abort', onAbort, { once: true });

    const timer = setTimeout(() => controller.abort(new SamplingTimeoutError(this.timeoutMs)), this.timeoutMs);

    const interrupted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
    });

    try {
      const entries = await Promise.race([this.source(controller.signal), interrupted]);
      return this.collect(entries);
    } catch (error) {
      if (error instanceof SamplingError) {
        throw error;
      }
      throw new SamplingError(`Failed to read the process table: ${errorMessage(error)}`, { cause: error });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private collect(entries: readonly ProcessEntry[]): Snapshot {
    const records: ProcessRecord[] = [];
    const failures: ProcessFailure[] = [];

    for (const entry of entries) {
      if (entry.kind === 'failure') {
        failures.push(entry.failure);
        continue;
      }

      const problem = validateRecord(entry.record);
      if (problem) {
        failures.push({ pid: entry.record.pid, reason: problem });
      } else {
        records.push(entry.record);
      }
    }

    return {
      records,
      failures,
      omitted: failures.length,
      capturedAt: this.now()
    };
  }
}

function validateRecord(record: ProcessRecord): string | null {
  if (!Number.isInteger(record.pid) || record.pid < 0) {
    return `invalid pid ${record.pid}`;
  }
  if (!Number.isFinite(record.cpuPercent) || record.cpuPercent < 0) {
    return `invalid cpu usage ${record.cpuPercent}`;
  }
  if (!Number.isFinite(record.memoryBytes) || record.memoryBytes < 0) {
    return `invalid memory usage ${record.memoryBytes}`;
  }
  return null;
}
