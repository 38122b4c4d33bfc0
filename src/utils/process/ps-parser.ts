import * as path from 'path';
import { formatElapsed } from '../formatters.js';
import type { ProcessEntry, ProcessStatus } from './types.js';

/** Columns requested from `ps`; the trailing `=` suppresses the header row. */
export const PS_COLUMNS = 'pid=,ppid=,pcpu=,pmem=,rss=,vsz=,time=,etime=,stat=,user=,comm=';

/** Full command lines, read separately since they may contain any text. */
export const PS_ARGS_COLUMNS = 'pid=,args=';

const FIXED_FIELDS = 10;

/**
 * Parses `ps -Ao ${PS_COLUMNS}` output. `comm` is last so a name containing
 * spaces survives the whitespace split. Lines that do not parse become
 * failure entries rather than aborting the listing.
 */
export function parsePsOutput(stdout: string, now: Date = new Date()): ProcessEntry[] {
  return stdout
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0)
    .map(line => parsePsLine(line, now));
}

export function parsePsLine(line: string, now: Date = new Date()): ProcessEntry {
  const parts = line.split(/\s+/);
  const pid = Number(parts[0]);
  const knownPid = Number.isInteger(pid) && pid >= 0 ? pid : undefined;

  if (parts.length <= FIXED_FIELDS) {
    return { kind: 'failure', failure: { pid: knownPid, reason: `unexpected ps line: ${line}` } };
  }

  const [, ppid, cpu, mem, rss, vsz, time, etime, stat, user, ...commParts] = parts;
  const comm = commParts.join(' ');
  const numbers = [pid, Number(ppid), Number(cpu), Number(mem), Number(rss), Number(vsz)];

  if (knownPid === undefined || numbers.some(value => !Number.isFinite(value))) {
    return { kind: 'failure', failure: { pid: knownPid, reason: `unreadable ps fields: ${line}` } };
  }

  const runningSeconds = parseClockDuration(etime);

  return {
    kind: 'record',
    record: {
      pid,
      // Linux reports the bare name (kernel threads include `/`), macOS the executable path
      name: comm.startsWith('/') ? path.basename(comm) : comm,
      cpuPercent: Number(cpu),
      // rss and vsz are reported in KiB
      memoryBytes: Number(rss) * 1024,
      ppid: Number(ppid),
      status: parseStatus(stat),
      user,
      command: comm,
      memoryPercent: Number(mem),
      virtualMemoryBytes: Number(vsz) * 1024,
      cpuTime: parseClockDuration(time),
      startedAt: runningSeconds === undefined ? undefined : new Date(now.getTime() - runningSeconds * 1000),
      elapsed: runningSeconds === undefined ? etime : formatElapsed(runningSeconds)
    }
  };
}

/** Parses `ps -Ao ${PS_ARGS_COLUMNS}` output into command lines by PID. */
export function parsePsArgs(stdout: string): Map<number, string> {
  const commands = new Map<number, string>();
  for (const line of stdout.split('\n')) {
    const match = /^\s*(\d+)\s+(.*\S)\s*$/.exec(line);
    if (match) {
      commands.set(Number(match[1]), match[2]);
    }
  }
  return commands;
}

export function parseStatus(stat: string): ProcessStatus {
  switch (stat.charAt(0).toUpperCase()) {
    case 'R': return 'running';
    case 'S':
    case 'D':
    case 'U': return 'sleeping';
    case 'I': return 'idle';
    case 'T': return 'stopped';
    case 'Z': return 'zombie';
    default: return 'unknown';
  }
}

/**
 * Seconds in a `ps` clock value: `[DD-][HH:]MM:SS`, with optional
 * fractional seconds (`time` on macOS is `M:SS.cc`).
 */
export function parseClockDuration(value: string): number | undefined {
  const match = /^(?:(\d+)-)?(?:(\d+):)?(\d+):(\d+(?:\.\d+)?)$/.exec(value);
  if (!match) {
    return undefined;
  }
  const [, days = '0', hours = '0', minutes, seconds] = match;
  return Number(days) * 86400 + Number(hours) * 3600 + Number(minutes) * 60 + Number(seconds);
}
