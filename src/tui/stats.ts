import type { Task } from '../schema/index.js';
import { addDays, localDateOfTimestamp } from '../utils/date.js';

export const ACTIVITY_WINDOW_DAYS = 90;

export interface StatCounts {
  overdue: number;
  todo: number;
  done: number;
  deleted: number;
}

export interface DailyActivity {
  /** Oldest first, `ACTIVITY_WINDOW_DAYS + 1` entries ending at today. */
  days: string[];
  created: number[];
  completed: number[];
  overdue: number[];
}

export interface TaskStats {
  counts: StatCounts;
  activity: DailyActivity;
}

export function countTasks(persisted: readonly Task[], working: readonly Task[], today: string): StatCounts {
  return {
    overdue: working.filter((t) => t.dueDate !== null && t.dueDate < today && !t.completed).length,
    todo: working.length,
    done: persisted.filter((t) => t.completed).length,
    deleted: persisted.filter((t) => t.deleted).length,
  };
}

function tally(dates: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const d of dates) counts.set(d, (counts.get(d) ?? 0) + 1);
  return counts;
}

/**
 * A task counts as overdue on `day` when it was due before that day and had not
 * been completed before it.
 */
function overdueOn(tasks: readonly Task[], day: string): number {
  let count = 0;
  for (const task of tasks) {
    if (!task.dueDate || task.dueDate >= day) continue;
    if (task.completedAt && localDateOfTimestamp(task.completedAt) < day) continue;
    count++;
  }
  return count;
}

export function computeActivity(persisted: readonly Task[], today: string): DailyActivity {
  const start = addDays(today, -ACTIVITY_WINDOW_DAYS);
  const created = tally(persisted.map((t) => localDateOfTimestamp(t.createdAt)));
  const completed = tally(
    persisted.flatMap((t) => (t.completedAt ? [localDateOfTimestamp(t.completedAt)] : []))
  );

  const activity: DailyActivity = { days: [], created: [], completed: [], overdue: [] };
  for (let offset = 0; offset <= ACTIVITY_WINDOW_DAYS; offset++) {
    const day = addDays(start, offset);
    activity.days.push(day);
    activity.created.push(created.get(day) ?? 0);
    activity.completed.push(completed.get(day) ?? 0);
    activity.overdue.push(overdueOn(persisted, day));
  }
  return activity;
}

export function computeStats(persisted: readonly Task[], working: readonly Task[], today: string): TaskStats {
  return { counts: countTasks(persisted, working, today), activity: computeActivity(persisted, today) };
}
