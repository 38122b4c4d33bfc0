import { UsageError } from '../utils/errors.js';
import { rank } from '../utils/process/rank.js';
import type { Sampler } from '../utils/process/sampler.js';
import { isSortKey, SORT_KEYS, type ProcessRecord, type Snapshot, type SortKey } from '../utils/process/types.js';
import { UIHelper } from '../utils/ui.js';

export interface ListCommandOptions {
  sort: SortKey;
  count: number;
}

/** Options as commander hands them over, before validation. */
export interface RawListOptions {
  sort?: string;
  count?: string;
}

export function parseListOptions(raw: RawListOptions, defaults: ListCommandOptions): ListCommandOptions {
  const sort = raw.sort ?? defaults.sort;
  if (!isSortKey(sort)) {
    throw new UsageError(`Invalid sort key "${sort}". Use one of: ${SORT_KEYS.join(', ')}`);
  }

  let count = defaults.count;
  if (raw.count !== undefined) {
    const trimmed = raw.count.trim();
    count = /^\d+$/.test(trimmed) ? Number(trimmed) : NaN;
    if (!Number.isSafeInteger(count) || count < 1) {
      throw new UsageError(`Invalid count "${raw.count}". Use a positive integer`);
    }
  }

  return { sort, count };
}

// CPU usage is measured between two reads this far apart
export const CPU_SETTLE_MS = 100;

export class ListCommand {
  constructor(private readonly sampler: Sampler, private readonly settleMs: number = CPU_SETTLE_MS) {}

  /** Reads the table twice, prints the ranked second read and returns the rows shown. */
  async execute(options: ListCommandOptions): Promise<ProcessRecord[]> {
    const spinner = UIHelper.createSpinner('Sampling processes...');
    spinner.start();

    const snapshot = await this.measure().finally(() => spinner.stop());

    const rows = rank(snapshot.records, options.sort, options.count);
    UIHelper.showProcessTable(rows, `Top ${options.count} processes sorted by ${options.sort}`, options.sort);

    if (snapshot.omitted > 0) {
      UIHelper.showWarning(`${snapshot.omitted} process(es) could not be read`);
    }

    return rows;
  }

  private async measure(): Promise<Snapshot> {
    await this.sampler.sample();
    await new Promise(resolve => setTimeout(resolve, this.settleMs));
    return this.sampler.sample();
  }
}
