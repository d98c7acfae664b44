import { describe, it, expect } from 'vitest';
import { moveCursor, selectedTargets, toggleMark, visibleWindow, type PickerState } from '../picker';
import { toStatusCandidate } from '../../sources/gitstatus';

function state(paths: string[]): PickerState {
  return {
    candidates: paths.map((p) => toStatusCandidate({ status: ' M', path: p }, '/repo')),
    cursor: 0,
    marked: new Set(),
  };
}

describe('picker state', () => {
  it('targets the candidate under the cursor when nothing is marked', () => {
    const s = state(['a', 'b', 'c']);
    moveCursor(s, 1);

    expect(selectedTargets(s).map((c) => c.path)).toEqual(['b']);
  });

  it('targets marked candidates in list order', () => {
    const s = state(['a', 'b', 'c']);
    s.cursor = 2;
    toggleMark(s);
    s.cursor = 0;
    toggleMark(s);

    expect(selectedTargets(s).map((c) => c.path)).toEqual(['a', 'c']);
  });

  it('moves the cursor down after marking and unmarks on a second toggle', () => {
    const s = state(['a', 'b']);
    toggleMark(s);
    expect(s.cursor).toBe(1);

    s.cursor = 0;
    toggleMark(s);
    expect(s.marked.size).toBe(0);
  });

  it('keeps the cursor within the list', () => {
    const s = state(['a', 'b']);
    moveCursor(s, -1);
    expect(s.cursor).toBe(0);
    moveCursor(s, 5);
    expect(s.cursor).toBe(1);
  });

  it('has nothing to target in an empty list', () => {
    const s = state([]);
    moveCursor(s, 1);
    toggleMark(s);

    expect(s.cursor).toBe(0);
    expect(selectedTargets(s)).toEqual([]);
  });
});

describe('visibleWindow', () => {
  it('shows everything when it fits', () => {
    expect(visibleWindow(5, 4, 10)).toEqual([0, 5]);
  });

  it('centres the cursor in a long list', () => {
    expect(visibleWindow(100, 50, 10)).toEqual([45, 55]);
  });

  it('clamps at both ends', () => {
    expect(visibleWindow(100, 2, 10)).toEqual([0, 10]);
    expect(visibleWindow(100, 99, 10)).toEqual([90, 100]);
  });
});
