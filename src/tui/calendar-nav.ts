import {
  addDays,
  compareYearMonth,
  firstOfMonth,
  shiftYearMonth,
  yearMonthOf,
  type YearMonth,
} from '../utils/date.js';

export interface CalendarState {
  /** Middle month of the visible three-month window. */
  anchor: string;
  /** Highlighted day; null until the calendar is first used. */
  cursor: string | null;
}

export type CalendarStep = 'previousDay' | 'nextDay' | 'weekAbove' | 'weekBelow';

const STEP_DAYS: Record<CalendarStep, number> = {
  previousDay: -1,
  nextDay: 1,
  weekAbove: -7,
  weekBelow: 7,
};

export function createCalendarState(today: string): CalendarState {
  return { anchor: today, cursor: null };
}

export function visibleMonths(anchor: string): [YearMonth, YearMonth, YearMonth] {
  const current = yearMonthOf(anchor);
  return [shiftYearMonth(current, -1), current, shiftYearMonth(current, 1)];
}

/**
 * Shift the anchor by one month when the cursor has left the visible window.
 * Steps are at most a week, so one month of correction is always enough.
 */
export function containWindow(calendar: CalendarState): CalendarState {
  if (!calendar.cursor) return calendar;
  const [first, current, last] = visibleMonths(calendar.anchor);
  const cursorMonth = yearMonthOf(calendar.cursor);

  if (compareYearMonth(cursorMonth, first) < 0) {
    return { ...calendar, anchor: firstOfMonth(shiftYearMonth(current, -1)) };
  }
  if (compareYearMonth(cursorMonth, last) > 0) {
    return { ...calendar, anchor: firstOfMonth(shiftYearMonth(current, 1)) };
  }
  return calendar;
}

export function moveCursor(calendar: CalendarState, step: CalendarStep, today: string): CalendarState {
  if (!calendar.cursor) {
    return { ...calendar, cursor: today };
  }
  return containWindow({ ...calendar, cursor: addDays(calendar.cursor, STEP_DAYS[step]) });
}

export function ensureCursor(calendar: CalendarState, today: string): CalendarState {
  return calendar.cursor ? calendar : { ...calendar, cursor: today };
}

export function resetToToday(today: string): CalendarState {
  return { anchor: today, cursor: today };
}
