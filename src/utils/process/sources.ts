import { exec } from 'child_process';
import { promisify } from 'util';
import si from 'systeminformation';
import type { Systeminformation } from 'systeminformation';
import { formatElapsed } from '../formatters.js';
import { CpuUsageTracker } from './cpu-usage.js';
import { parsePsArgs, parsePsOutput, PS_ARGS_COLUMNS, PS_COLUMNS } from './ps-parser.js';
import type { ProcessEntry, ProcessSource, ProcessSourceName, ProcessStatus } from './types.js';

const execAsync = promisify(exec);

// A busy host can list tens of thousands of processes
const PS_MAX_BUFFER = 32 * 1024 * 1024;

/** Runs a shell command and resolves to its stdout. */
export type CommandRunner = (command: string, signal?: AbortSignal) => Promise<string>;

const runCommand: CommandRunner = async (command, signal) => {
  const { stdout } = await execAsync(command, {
    maxBuffer: PS_MAX_BUFFER,
    signal,
    env: { ...process.env, LC_ALL: 'C' }
  });
  return stdout;
};

export interface PsSourceOptions {
  run?: CommandRunner;
  now?: () => number;
}

/**
 * Reads the process table with `ps` (macOS and other Unix hosts). CPU usage
 * comes from the CPU time each process consumed since the previous read, so
 * every source instance remembers its last read.
 */
export function createPsSource(options: PsSourceOptions = {}): ProcessSource {
  const run = options.run ?? runCommand;
  const now = options.now ?? Date.now;
  const tracker = new CpuUsageTracker();

  return async (signal) => {
    const [table, args] = await Promise.all([
      run(`ps -Ao ${PS_COLUMNS}`, signal),
      run(`ps -Ao ${PS_ARGS_COLUMNS}`, signal)
    ]);
    const at = now();
    const commands = parsePsArgs(args);

    const entries = parsePsOutput(table, new Date(at)).map((entry): ProcessEntry => {
      if (entry.kind !== 'record') return entry;
      const command = commands.get(entry.record.pid);
      return command === undefined ? entry : { kind: 'record', record: { ...entry.record, command } };
    });

    return tracker.apply(entries, at);
  };
}

/**
 * Reads the process table through systeminformation. It measures CPU usage
 * between successive calls itself.
 */
export const systemInformationSource: ProcessSource = async () => {
  const { list } = await si.processes();
  return fromSystemInformation(list);
};

export type SystemInformationProcess = Pick<
  Systeminformation.ProcessesProcessData,
  'pid' | 'parentPid' | 'name' | 'cpu' | 'mem' | 'memRss' | 'memVsz' | 'state' | 'user' | 'command' | 'params' | 'started'
>;

export function fromSystemInformation(list: readonly SystemInformationProcess[], now: Date = new Date()): ProcessEntry[] {
  return list.map((proc): ProcessEntry => {
    if (!Number.isInteger(proc.pid) || proc.pid < 0) {
      return { kind: 'failure', failure: { reason: `invalid pid for ${proc.name || 'unnamed process'}` } };
    }
    if (!Number.isFinite(proc.cpu) || !Number.isFinite(proc.memRss)) {
      return { kind: 'failure', failure: { pid: proc.pid, reason: 'usage counters unavailable' } };
    }

    const command = [proc.command, proc.params].filter(part => part.length > 0).join(' ');
    const startedAt = parseStarted(proc.started);
    return {
      kind: 'record',
      record: {
        pid: proc.pid,
        name: proc.name,
        cpuPercent: proc.cpu,
        // memRss and memVsz are reported in KiB
        memoryBytes: proc.memRss * 1024,
        ppid: proc.parentPid,
        status: mapState(proc.state),
        user: proc.user || undefined,
        command: command || undefined,
        memoryPercent: Number.isFinite(proc.mem) ? proc.mem : undefined,
        virtualMemoryBytes: Number.isFinite(proc.memVsz) && proc.memVsz > 0 ? proc.memVsz * 1024 : undefined,
        startedAt,
        elapsed: startedAt ? formatElapsed((now.getTime() - startedAt.getTime()) / 1000) : undefined
      }
    };
  });
}

// `started` is local time as `YYYY-MM-DD HH:MM:SS`
function parseStarted(started: string): Date | undefined {
  if (!started) return undefined;
  const date = new Date(started.replace(' ', 'T'));
  return Number.isNaN(date.getTime()) ? undefined : date;
}

function mapState(state: string): ProcessStatus {
  switch (state) {
    case 'running': return 'running';
    case 'sleeping':
    case 'blocked': return 'sleeping';
    case 'stopped': return 'stopped';
    case 'zombie': return 'zombie';
    case 'idle': return 'idle';
    default: return 'unknown';
  }
}

/**
 * `auto` uses systeminformation on Linux and Windows, where it measures CPU
 * over short intervals, and `ps` on macOS and other Unix hosts.
 */
export function resolveSourceName(name: ProcessSourceName, platform: NodeJS.Platform = process.platform): 'ps' | 'systeminformation' {
  if (name !== 'auto') return name;
  return platform === 'linux' || platform === 'win32' ? 'systeminformation' : 'ps';
}

export function createProcessSource(name: ProcessSourceName, platform: NodeJS.Platform = process.platform): ProcessSource {
  return resolveSourceName(name, platform) === 'ps' ? createPsSource() : systemInformationSource;
}
