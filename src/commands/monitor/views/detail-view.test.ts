import { describe, expect, it } from 'vitest';
import { makeRecord } from '../../../test/fixtures.js';
import { stripAnsi } from '../../../utils/formatters.js';
import { renderDetailLines } from './detail-view.js';

describe('renderDetailLines', () => {
  it('lists every attribute of the record', () => {
    const record = makeRecord(4242, {
      name: 'node',
      cpuPercent: 12.5,
      memoryBytes: 3 * 1024 * 1024,
      ppid: 1,
      status: 'running',
      user: 'alice',
      command: '/usr/bin/node server.js --port 8080',
      memoryPercent: 0.8,
      virtualMemoryBytes: 512 * 1024 * 1024,
      cpuTime: 75,
      startedAt: new Date('2024-05-01T09:00:00'),
      elapsed: '1h 2m'
    });

    expect(renderDetailLines(record).map(stripAnsi)).toEqual([
      'PID          4242',
      'Name         node',
      'Parent PID   1',
      'Status       running',
      'User         alice',
      'CPU          12.5%',
      'CPU time     1m 15s',
      'Memory (RSS) 3.0 MB',
      'Virtual mem  512.0 MB',
      'Memory %     0.8%',
      'Started      2024-05-01 09:00:00',
      'Running for  1h 2m',
      'Command      /usr/bin/node server.js --port 8080'
    ]);
  });

  it('shows a dash for attributes the source did not provide', () => {
    const lines = renderDetailLines(makeRecord(5)).map(stripAnsi);

    expect(lines[2]).toBe('Parent PID   -');
    expect(lines[6]).toBe('CPU time     -');
    expect(lines[10]).toBe('Started      -');
    expect(lines[12]).toBe('Command      -');
  });
});
