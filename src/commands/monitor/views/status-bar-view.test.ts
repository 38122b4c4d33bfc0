import { describe, expect, it } from 'vitest';
import { statusHints } from './status-bar-view.js';

describe('statusHints', () => {
  it('follows the dashboard mode', () => {
    expect(statusHints({ kind: 'running' })).toContain('[Enter] Details');
    expect(statusHints({ kind: 'help' })).toBe(' Press any key to close the help ');
    expect(statusHints({ kind: 'detail', pid: 42 })).toBe(' Process 42  [Esc/Enter] Back  [q] Quit ');
  });
});
