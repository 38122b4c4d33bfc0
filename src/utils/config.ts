import { defaultConfig, type ProcPeekConfig } from '../types/config.js';
import { UsageError } from './errors.js';
import { isProcessSourceName, PROCESS_SOURCE_NAMES, type ProcessSourceName } from './process/types.js';

/** Options shared by every invocation, as commander hands them over. */
export interface GlobalCliOptions {
  refresh?: string;
  timeout?: string;
  source?: string;
  debug?: boolean;
}

/**
 * Resolves the effective configuration: defaults, then environment
 * overrides, then command-line options.
 */
export function resolveConfig(options: GlobalCliOptions = {}, env: NodeJS.ProcessEnv = process.env): ProcPeekConfig {
  const config: ProcPeekConfig = { ...defaultConfig };

  if (env.PROC_PEEK_REFRESH_MS !== undefined) {
    config.refreshIntervalMs = parsePositiveNumber(env.PROC_PEEK_REFRESH_MS, 'PROC_PEEK_REFRESH_MS');
  }
  if (env.PROC_PEEK_SAMPLE_TIMEOUT_MS !== undefined) {
    config.sampleTimeoutMs = parsePositiveNumber(env.PROC_PEEK_SAMPLE_TIMEOUT_MS, 'PROC_PEEK_SAMPLE_TIMEOUT_MS');
  }
  if (env.PROC_PEEK_SOURCE !== undefined) {
    config.source = parseSourceName(env.PROC_PEEK_SOURCE, 'PROC_PEEK_SOURCE');
  }

  if (options.refresh !== undefined) {
    config.refreshIntervalMs = secondsToMs(parsePositiveNumber(options.refresh, '--refresh'));
  }
  if (options.timeout !== undefined) {
    config.sampleTimeoutMs = secondsToMs(parsePositiveNumber(options.timeout, '--timeout'));
  }
  if (options.source !== undefined) {
    config.source = parseSourceName(options.source, '--source');
  }
  if (options.debug) {
    config.debug = true;
  }

  return config;
}

function parsePositiveNumber(raw: string, name: string): number {
  const value = Number(raw.trim());
  if (raw.trim() === '' || !Number.isFinite(value) || value <= 0) {
    throw new UsageError(`${name} must be a positive number, got "${raw}"`);
  }
  return value;
}

function parseSourceName(raw: string, name: string): ProcessSourceName {
  if (!isProcessSourceName(raw)) {
    throw new UsageError(`${name} must be one of ${PROCESS_SOURCE_NAMES.join(', ')}, got "${raw}"`);
  }
  return raw;
}

function secondsToMs(seconds: number): number {
  return Math.max(1, Math.round(seconds * 1000));
}
