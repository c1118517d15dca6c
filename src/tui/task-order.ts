import type { Task } from '../schema/index.js';

function compareCreated(a: Task, b: Task): number {
  const at = Date.parse(a.createdAt);
  const bt = Date.parse(b.createdAt);
  return at - bt;
}

/**
 * Display order: dated tasks before undated ones, earlier due dates first,
 * creation time breaking ties (and ordering the undated tail).
 */
export function compareTasks(a: Task, b: Task): number {
  if (a.dueDate && b.dueDate) {
    const byDue = a.dueDate.localeCompare(b.dueDate);
    if (byDue !== 0) return byDue;
    return compareCreated(a, b);
  }
  if (a.dueDate) return -1;
  if (b.dueDate) return 1;
  return compareCreated(a, b);
}

/** Stable; returns a new array. */
export function sortTasks(tasks: readonly Task[]): Task[] {
  return [...tasks].sort(compareTasks);
}
