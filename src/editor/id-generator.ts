/**
 * Next id for a new task: one past the largest id ever stored, 1 for an empty collection.
 * Pass the full persisted collection so ids of completed or deleted tasks are never reused.
 */
export function nextTaskId(tasks: readonly { id: number }[]): number {
  let maxId = 0;
  for (const task of tasks) {
    if (task.id > maxId) maxId = task.id;
  }
  return maxId + 1;
}
