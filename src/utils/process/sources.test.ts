import { describe, expect, it, vi } from 'vitest';
import { PS_ARGS_COLUMNS, PS_COLUMNS } from './ps-parser.js';
import {
  createProcessSource,
  createPsSource,
  fromSystemInformation,
  resolveSourceName,
  systemInformationSource,
  type SystemInformationProcess
} from './sources.js';
import type { ProcessEntry } from './types.js';

function siProcess(overrides: Partial<SystemInformationProcess> = {}): SystemInformationProcess {
  return {
    pid: 500,
    parentPid: 4,
    name: 'explorer.exe',
    cpu: 1.5,
    mem: 2.25,
    memRss: 1024,
    memVsz: 4096,
    state: 'running',
    user: 'alice',
    command: 'C:\\Windows\\explorer.exe',
    params: '',
    started: '2024-05-01 09:00:00',
    ...overrides
  };
}

const recordOf = (entry: ProcessEntry | undefined) => (entry?.kind === 'record' ? entry.record : undefined);

describe('createPsSource', () => {
  function fakePs(reads: Array<{ table: string[]; args: string[] }>) {
    let call = 0;
    const run = vi.fn(async (command: string) => {
      const read = reads[Math.min(call, reads.length - 1)];
      if (command.includes('args=')) {
        call++;
        return read.args.join('\n');
      }
      return read.table.join('\n');
    });
    return run;
  }

  it('measures cpu from the CPU time used between reads', async () => {
    const run = fakePs([
      {
        table: ['300 1 2.0 0.5 1000 2000 0:10.00 01:00 R alice python3'],
        args: ['300 python3 worker.py --busy']
      },
      {
        table: [
          '300 1 2.0 0.5 1000 2000 0:11.50 01:02 R alice python3',
          '301 1 4.0 0.1 500 1000 0:00.20 00:01 S alice sh'
        ],
        args: ['300 python3 worker.py --busy']
      }
    ]);
    let clock = 10_000;
    const source = createPsSource({ run, now: () => clock });

    await source();
    clock = 12_000;
    const [busy, fresh] = await source();

    expect(recordOf(busy)).toMatchObject({ pid: 300, cpuPercent: 75, command: 'python3 worker.py --busy' });
    expect(recordOf(fresh)).toMatchObject({ pid: 301, cpuPercent: 4, command: 'sh' });
  });

  it('runs both ps queries with the caller signal', async () => {
    const run = fakePs([{ table: [], args: [] }]);
    const controller = new AbortController();

    await createPsSource({ run })(controller.signal);

    expect(run).toHaveBeenCalledWith(`ps -Ao ${PS_COLUMNS}`, controller.signal);
    expect(run).toHaveBeenCalledWith(`ps -Ao ${PS_ARGS_COLUMNS}`, controller.signal);
  });
});

describe('fromSystemInformation', () => {
  const now = new Date('2024-05-01T10:30:00');

  it('maps a process entry to a record', () => {
    expect(fromSystemInformation([siProcess()], now)).toEqual([
      {
        kind: 'record',
        record: {
          pid: 500,
          name: 'explorer.exe',
          cpuPercent: 1.5,
          memoryBytes: 1024 * 1024,
          ppid: 4,
          status: 'running',
          user: 'alice',
          command: 'C:\\Windows\\explorer.exe',
          memoryPercent: 2.25,
          virtualMemoryBytes: 4096 * 1024,
          startedAt: new Date('2024-05-01T09:00:00'),
          elapsed: '1h 30m'
        }
      }
    ]);
  });

  it('leaves the running time out when the start time is unknown', () => {
    const record = recordOf(fromSystemInformation([siProcess({ started: '' })], now)[0]);

    expect(record?.startedAt).toBeUndefined();
    expect(record?.elapsed).toBeUndefined();
  });

  it('joins the command with its parameters and maps states', () => {
    const [entry] = fromSystemInformation([siProcess({ command: 'node', params: 'server.js --port 3000', state: 'blocked' })], now);

    expect(entry).toMatchObject({
      kind: 'record',
      record: { command: 'node server.js --port 3000', status: 'sleeping' }
    });
  });

  it('reports entries without usable counters as failures', () => {
    const entries = fromSystemInformation([
      siProcess({ pid: 1 }),
      siProcess({ pid: -1, name: 'ghost' }),
      siProcess({ pid: 2, memRss: Number.NaN })
    ], now);

    expect(entries).toEqual([
      expect.objectContaining({ kind: 'record' }),
      { kind: 'failure', failure: { reason: 'invalid pid for ghost' } },
      { kind: 'failure', failure: { pid: 2, reason: 'usage counters unavailable' } }
    ]);
  });
});

describe('resolveSourceName', () => {
  it('uses systeminformation on Linux and Windows and ps elsewhere', () => {
    expect(resolveSourceName('auto', 'linux')).toBe('systeminformation');
    expect(resolveSourceName('auto', 'win32')).toBe('systeminformation');
    expect(resolveSourceName('auto', 'darwin')).toBe('ps');
    expect(resolveSourceName('auto', 'freebsd')).toBe('ps');
  });

  it('honours an explicit choice', () => {
    expect(resolveSourceName('ps', 'linux')).toBe('ps');
    expect(resolveSourceName('systeminformation', 'darwin')).toBe('systeminformation');
  });
});

describe('createProcessSource', () => {
  it('returns the systeminformation reader when it is chosen', () => {
    expect(createProcessSource('auto', 'linux')).toBe(systemInformationSource);
    expect(createProcessSource('ps', 'linux')).not.toBe(systemInformationSource);
  });
});
