import type { Task } from '../schema/index.js';

export function selectPrevious(index: number | null, length: number): number | null {
  if (length === 0) return null;
  if (index === null) return 0;
  return index > 0 ? index - 1 : length - 1;
}

export function selectNext(index: number | null, length: number): number | null {
  if (length === 0) return null;
  if (index === null) return 0;
  return index < length - 1 ? index + 1 : 0;
}

/**
 * Fix up a selection after the list shrank: empty -> null, past the end -> last row.
 */
export function clampSelection(index: number | null, length: number): number | null {
  if (length === 0) return null;
  if (index === null) return 0;
  return index >= length ? length - 1 : index;
}

export function selectById(tasks: readonly Task[], id: number): number | null {
  const index = tasks.findIndex((t) => t.id === id);
  return index === -1 ? null : index;
}
