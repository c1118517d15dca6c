import type { Task } from '../schema/index.js';

export interface TaskFields {
  title: string;
  description: string;
  dueDate: string | null;
}

export function createTask(id: number, fields: TaskFields, now: Date): Task {
  return {
    id,
    title: fields.title,
    description: fields.description,
    completed: false,
    deleted: false,
    createdAt: now.toISOString(),
    dueDate: fields.dueDate,
    completedAt: null,
  };
}

export function applyEdit(task: Task, fields: TaskFields): Task {
  return { ...task, title: fields.title, description: fields.description, dueDate: fields.dueDate };
}

/**
 * Flip completion. `completedAt` is stamped on false -> true and cleared on true -> false.
 */
export function toggleCompleted(task: Task, now: Date): Task {
  const completed = !task.completed;
  return { ...task, completed, completedAt: completed ? now.toISOString() : null };
}

export function markDeleted(task: Task): Task {
  return { ...task, deleted: true };
}

export function isActive(task: Task): boolean {
  return !task.completed && !task.deleted;
}

export function formatTaskLabel(task: Task): string {
  return task.dueDate ? `${task.title} (Due: ${task.dueDate})` : task.title;
}

export function isOverdue(task: Task, today: string): boolean {
  return task.dueDate !== null && !task.completed && task.dueDate < today;
}
