import type { ProcPeekConfig } from '../types/config.js';
import { Sampler } from '../utils/process/sampler.js';
import { createProcessSource } from '../utils/process/sources.js';

/** What the commands need from the outside world, replaceable in tests. */
export interface CliContext {
  createSampler: (config: ProcPeekConfig) => Sampler;
  env: NodeJS.ProcessEnv;
}

export const defaultContext: CliContext = {
  createSampler: config => new Sampler({
    source: createProcessSource(config.source),
    timeoutMs: config.sampleTimeoutMs
  }),
  env: process.env
};
