import { describe, expect, it } from 'vitest';
import { buildMonthGrid, collectDueMarks, type CalendarCell, type DueMark } from '../../src/tui/calendar-grid.js';
import { makeTask } from '../helpers/memory-storage.js';

const JUNE_2024 = { year: 2024, month: 6 };

function isCell(cell: CalendarCell | null): cell is CalendarCell {
  return cell !== null;
}

describe('buildMonthGrid', () => {
  it('lays out a Sunday-first month', () => {
    const grid = buildMonthGrid(JUNE_2024, { today: '2024-06-15', cursor: null, dueMarks: new Map() });
    expect(grid.title).toBe('June 2024');
    expect(grid.weekdays).toEqual(['Su', 'Mo', 'Tu', 'We', 'Th', 'Fr', 'Sa']);
    expect(grid.weeks).toHaveLength(6);
    // June 1st 2024 is a Saturday.
    expect(grid.weeks[0]?.slice(0, 6)).toEqual([null, null, null, null, null, null]);
    expect(grid.weeks[0]?.[6]?.date).toBe('2024-06-01');
    expect(grid.weeks[5]?.[0]?.date).toBe('2024-06-30');
    expect(grid.weeks[5]?.[1]).toBeNull();
  });

  it('lays out a Monday-first month', () => {
    const grid = buildMonthGrid(JUNE_2024, {
      today: '2024-06-15',
      cursor: null,
      dueMarks: new Map(),
      weekStart: 'monday',
    });
    expect(grid.weekdays).toEqual(['Mo', 'Tu', 'We', 'Th', 'Fr', 'Sa', 'Su']);
    expect(grid.weeks).toHaveLength(5);
    expect(grid.weeks[0]?.[5]?.day).toBe(1);
    expect(grid.weeks[4]?.[6]?.day).toBe(30);
  });

  it('marks today, the cursor and due days', () => {
    const grid = buildMonthGrid(JUNE_2024, {
      today: '2024-06-15',
      cursor: '2024-06-20',
      dueMarks: new Map<string, DueMark>([['2024-06-10', 'overdue']]),
    });
    const cells = grid.weeks.flat().filter(isCell);
    expect(cells.find((c) => c.isToday)?.date).toBe('2024-06-15');
    expect(cells.find((c) => c.isCursor)?.date).toBe('2024-06-20');
    expect(cells.find((c) => c.date === '2024-06-10')?.due).toBe('overdue');
    expect(cells.find((c) => c.date === '2024-06-11')?.due).toBe('none');
  });

  it('has 29 days in February of a leap year', () => {
    const grid = buildMonthGrid({ year: 2024, month: 2 }, { today: '2024-06-15', cursor: null, dueMarks: new Map() });
    expect(grid.weeks.flat().filter(isCell)).toHaveLength(29);
  });
});

describe('collectDueMarks', () => {
  it('lets overdue win over due on the same day', () => {
    const marks = collectDueMarks(
      [
        makeTask({ id: 1, dueDate: '2024-06-10', completed: true, completedAt: '2024-06-09T12:00:00.000Z' }),
        makeTask({ id: 2, dueDate: '2024-06-10' }),
        makeTask({ id: 3, dueDate: '2024-06-20' }),
        makeTask({ id: 4 }),
      ],
      '2024-06-15'
    );
    expect(marks.get('2024-06-10')).toBe('overdue');
    expect(marks.get('2024-06-20')).toBe('due');
    expect(marks.size).toBe(2);
  });
});
