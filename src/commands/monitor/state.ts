import { nextSortKey, rank } from '../../utils/process/rank.js';
import type { ProcessRecord, Snapshot, SortKey } from '../../utils/process/types.js';
import type { KeyName, MonitorEvent, MonitorState, ViewState } from './types.js';

const PAGE_SIZE = 10;

const SORT_BINDINGS: Partial<Record<string, SortKey>> = {
  c: 'cpu',
  m: 'memory',
  n: 'name',
  p: 'pid'
};

const NAVIGATION_KEYS = new Set(['up', 'down', 'k', 'j', 'pageup', 'pagedown', 'home', 'end', 'g', 'G']);

export function createInitialState(view: ViewState): MonitorState {
  return {
    mode: { kind: 'running' },
    view: { ...view, rowLimit: Math.max(1, view.rowLimit) },
    snapshot: null,
    rows: [],
    banner: null,
    summary: null
  };
}

/**
 * Advances the dashboard state. Pure: rendering, sampling and terminal
 * teardown are left to the caller.
 */
export function reduce(state: MonitorState, event: MonitorEvent): MonitorState {
  if (state.mode.kind === 'exiting') {
    return state;
  }

  switch (event.type) {
    case 'snapshot':
      return applySnapshot(state, event.snapshot);
    case 'sampleFailed':
      return { ...state, banner: event.message };
    case 'resize':
      return rerank({ ...state, view: { ...state.view, rowLimit: Math.max(1, Math.floor(event.rowLimit)) } });
    case 'key':
      return applyKey(state, event.key);
    case 'summary':
      return { ...state, summary: event.summary };
  }
}

function applySnapshot(state: MonitorState, snapshot: Snapshot): MonitorState {
  const present = new Set(snapshot.records.map(record => record.pid));
  const { selectedPid } = state.view;
  let { mode } = state;
  let banner: string | null = null;

  if (mode.kind === 'detail' && !present.has(mode.pid)) {
    banner = `Process ${mode.pid} is no longer running`;
    mode = { kind: 'running' };
  }

  return rerank({
    ...state,
    mode,
    banner,
    snapshot,
    view: {
      ...state.view,
      selectedPid: selectedPid !== null && present.has(selectedPid) ? selectedPid : null
    }
  });
}

function applyKey(state: MonitorState, key: KeyName): MonitorState {
  if (key === 'q' || key === 'C-c') {
    return { ...state, mode: { kind: 'exiting' } };
  }

  switch (state.mode.kind) {
    case 'help':
      return { ...state, mode: { kind: 'running' } };
    case 'detail':
      return key === 'escape' || key === 'enter' ? { ...state, mode: { kind: 'running' } } : state;
    default:
      break;
  }

  if (key === '?') {
    return { ...state, mode: { kind: 'help' } };
  }

  if (key === 'enter') {
    const pid = state.view.selectedPid;
    if (pid !== null && state.snapshot?.records.some(record => record.pid === pid)) {
      return { ...state, mode: { kind: 'detail', pid } };
    }
    return state;
  }

  if (key === 's') {
    return setSortKey(state, nextSortKey(state.view.sortKey));
  }

  const sortKey = SORT_BINDINGS[key];
  if (sortKey) {
    return setSortKey(state, sortKey);
  }

  if (NAVIGATION_KEYS.has(key)) {
    return moveSelection(state, key);
  }

  return state;
}

function setSortKey(state: MonitorState, sortKey: SortKey): MonitorState {
  if (sortKey === state.view.sortKey) {
    return state;
  }
  return rerank({ ...state, view: { ...state.view, sortKey } });
}

function moveSelection(state: MonitorState, key: KeyName): MonitorState {
  const { rows } = state;
  if (rows.length === 0) {
    return state;
  }

  const last = rows.length - 1;
  const current = rows.findIndex(record => record.pid === state.view.selectedPid);
  const hasCurrent = current >= 0;
  let target: number;

  switch (key) {
    case 'down':
    case 'j':
      target = hasCurrent ? current + 1 : 0;
      break;
    case 'up':
    case 'k':
      target = hasCurrent ? current - 1 : last;
      break;
    case 'pagedown':
      target = hasCurrent ? current + PAGE_SIZE : 0;
      break;
    case 'pageup':
      target = hasCurrent ? current - PAGE_SIZE : last;
      break;
    case 'home':
    case 'g':
      target = 0;
      break;
    default:
      target = last;
  }

  const clamped = Math.min(last, Math.max(0, target));
  return { ...state, view: { ...state.view, selectedPid: rows[clamped].pid } };
}

function rerank(state: MonitorState): MonitorState {
  if (!state.snapshot) {
    return state;
  }
  return { ...state, rows: rank(state.snapshot.records, state.view.sortKey, state.view.rowLimit) };
}

/** The record behind the detail overlay, taken from the latest snapshot. */
export function detailRecord(state: MonitorState): ProcessRecord | undefined {
  if (state.mode.kind !== 'detail' || !state.snapshot) {
    return undefined;
  }
  const { pid } = state.mode;
  return state.snapshot.records.find(record => record.pid === pid);
}
