import { describe, expect, it } from 'vitest';
import { stripAnsi } from '../../../utils/formatters.js';
import { renderHelpLines } from './help-view.js';

describe('renderHelpLines', () => {
  it('lists the key bindings and how to close', () => {
    const lines = renderHelpLines().map(stripAnsi);

    expect(lines[0]).toBe('↑/k ↓/j       Move selection');
    expect(lines).toContain('q / Ctrl-C    Quit');
    expect(lines.slice(-2)).toEqual(['', 'Press any key to close']);
  });
});
