import type { ProcessSourceName, SortKey } from '../utils/process/types.js';

export interface ProcPeekConfig {
  // Interactive mode
  refreshIntervalMs: number;
  sampleTimeoutMs: number;
  debug: boolean;

  // Where process data comes from (auto picks by platform)
  source: ProcessSourceName;

  // Listing mode
  defaultSort: SortKey;
  defaultCount: number;
}

export const defaultConfig: ProcPeekConfig = {
  refreshIntervalMs: 1000,
  sampleTimeoutMs: 2000,
  debug: false,
  source: 'auto',
  defaultSort: 'cpu',
  defaultCount: 10
};
