import type { Task } from '../schema/index.js';
import { daysInMonth, firstOfMonth, MONTH_NAMES, weekdayOf, type YearMonth } from '../utils/date.js';

export type WeekStart = 'sunday' | 'monday';

export type DueMark = 'none' | 'due' | 'overdue';

export interface CalendarCell {
  date: string;
  day: number;
  isToday: boolean;
  isCursor: boolean;
  due: DueMark;
}

export interface MonthGrid {
  title: string;
  weekdays: string[];
  /** Rows of seven slots; null pads days outside the month. */
  weeks: (CalendarCell | null)[][];
}

const WEEKDAYS_SUNDAY = ['Su', 'Mo', 'Tu', 'We', 'Th', 'Fr', 'Sa'];

export function collectDueMarks(tasks: readonly Task[], today: string): Map<string, DueMark> {
  const marks = new Map<string, DueMark>();
  for (const task of tasks) {
    if (!task.dueDate) continue;
    const mark: DueMark = task.dueDate < today && !task.completed ? 'overdue' : 'due';
    if (marks.get(task.dueDate) !== 'overdue') marks.set(task.dueDate, mark);
  }
  return marks;
}

export function buildMonthGrid(
  ym: YearMonth,
  options: { today: string; cursor: string | null; dueMarks: Map<string, DueMark>; weekStart?: WeekStart }
): MonthGrid {
  const weekStart = options.weekStart ?? 'sunday';
  const offset = weekStart === 'monday' ? 1 : 0;
  const weekdays = [...WEEKDAYS_SUNDAY.slice(offset), ...WEEKDAYS_SUNDAY.slice(0, offset)];

  const first = firstOfMonth(ym);
  const leading = (weekdayOf(first) - offset + 7) % 7;
  const total = daysInMonth(ym);
  const prefix = first.slice(0, 8);

  const slots: (CalendarCell | null)[] = Array.from({ length: leading }, () => null);
  for (let day = 1; day <= total; day++) {
    const date = `${prefix}${String(day).padStart(2, '0')}`;
    slots.push({
      date,
      day,
      isToday: date === options.today,
      isCursor: date === options.cursor,
      due: options.dueMarks.get(date) ?? 'none',
    });
  }
  while (slots.length % 7 !== 0) slots.push(null);

  const weeks: (CalendarCell | null)[][] = [];
  for (let i = 0; i < slots.length; i += 7) {
    weeks.push(slots.slice(i, i + 7));
  }

  return { title: `${MONTH_NAMES[ym.month - 1] ?? ''} ${ym.year}`, weekdays, weeks };
}
