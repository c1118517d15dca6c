import { describe, expect, it } from 'vitest';
import { clampSelection, selectById, selectNext, selectPrevious } from '../../src/tui/selection.js';
import { makeTask } from '../helpers/memory-storage.js';

describe('selectNext / selectPrevious', () => {
  it('wraps around both ends', () => {
    expect(selectNext(2, 3)).toBe(0);
    expect(selectPrevious(0, 3)).toBe(2);
    expect(selectNext(0, 3)).toBe(1);
    expect(selectPrevious(2, 3)).toBe(1);
  });

  it('returns null for an empty list', () => {
    expect(selectNext(null, 0)).toBeNull();
    expect(selectPrevious(null, 0)).toBeNull();
  });

  it('starts at the first row when nothing is selected', () => {
    expect(selectNext(null, 4)).toBe(0);
    expect(selectPrevious(null, 4)).toBe(0);
  });

  it('stays put on a single row', () => {
    expect(selectNext(0, 1)).toBe(0);
    expect(selectPrevious(0, 1)).toBe(0);
  });
});

describe('clampSelection', () => {
  it('moves a selection past the end to the last row', () => {
    expect(clampSelection(3, 3)).toBe(2);
  });

  it('clears the selection on an empty list', () => {
    expect(clampSelection(0, 0)).toBeNull();
  });

  it('keeps a valid selection', () => {
    expect(clampSelection(1, 3)).toBe(1);
  });
});

describe('selectById', () => {
  it('finds the row holding the id', () => {
    const tasks = [makeTask({ id: 4 }), makeTask({ id: 9 })];
    expect(selectById(tasks, 9)).toBe(1);
    expect(selectById(tasks, 1)).toBeNull();
  });
});
