import type { KeyName } from '../types.js';

interface KeyEvent {
  name?: string;
  ctrl?: boolean;
}

const NAMED_KEYS = new Set([
  'up', 'down', 'left', 'right', 'enter', 'escape',
  'pageup', 'pagedown', 'home', 'end', 'tab', 'backspace', 'space'
]);

/**
 * Maps a blessed keypress to the key names the dashboard understands.
 * Returns null for presses to ignore.
 */
export function normalizeKey(ch: string | undefined, key: KeyEvent | undefined): KeyName | null {
  if (key?.ctrl && key.name === 'c') {
    return 'C-c';
  }
  // blessed follows every `return` with a synthetic `enter`
  if (key?.name === 'return') {
    return null;
  }
  if (key?.name && NAMED_KEYS.has(key.name)) {
    return key.name;
  }
  if (ch && ch.length === 1 && ch >= ' ') {
    return ch;
  }
  return key?.name ?? null;
}
