import { describe, expect, it } from 'vitest';
import type { Task } from '../../src/schema/index.js';
import { createAppState, type AppState } from '../../src/tui/app-state.js';
import type { DrawOp, Frame } from '../../src/tui/frame.js';
import { buildFrame, getFooterHelp, sparkline, wrapText } from '../../src/tui/render.js';
import { MemoryStorage, fixedClock, makeTask } from '../helpers/memory-storage.js';

const TODAY = '2024-06-15';
const SIZE = { width: 120, height: 30, today: TODAY };

function stateWith(tasks: Task[]): AppState {
  return createAppState({ storage: new MemoryStorage(tasks), clock: fixedClock('2024-06-15T10:00:00.000Z') });
}

/** Last operation drawn at a position, i.e. what is visible there. */
function opAt(frame: Frame, x: number, y: number): DrawOp | undefined {
  return frame.ops.filter((op) => op.x === x && op.y === y).at(-1);
}

const sample = [
  makeTask({ id: 1, title: 'Alpha', description: 'first line\nsecond', dueDate: '2024-06-10' }),
  makeTask({ id: 2, title: 'Beta' }),
];

describe('sparkline', () => {
  it('scales bars to the largest value', () => {
    expect(sparkline([0, 1, 2, 4], 4)).toBe(' ▂▄█');
  });

  it('keeps the most recent values', () => {
    expect(sparkline([0, 1, 2, 4], 2)).toBe('▄█');
  });
});

describe('wrapText', () => {
  it('breaks long lines and keeps explicit ones', () => {
    expect(wrapText('abcdef', 4)).toEqual(['abcd', 'ef']);
    expect(wrapText('a\nb', 4)).toEqual(['a', 'b']);
    expect(wrapText('', 4)).toEqual(['']);
  });
});

describe('getFooterHelp', () => {
  it('lists every normal-mode key when there is room', () => {
    expect(getFooterHelp({ kind: 'normal' }, 120)).toBe(
      '+: new  d: done  -: delete  enter: edit/new on day  tab: panels  t: today  shift+←/→: tabs  q: quit'
    );
  });

  it('cuts hints that do not fit and marks the cut', () => {
    const edit = { taskId: null, title: '', description: '', dueDate: null, dateInput: '', scroll: 0 };
    expect(getFooterHelp({ kind: 'editingTitle', edit }, 30)).toBe('tab: next field  enter: save');
    expect(getFooterHelp({ kind: 'editingTitle', edit }, 35)).toBe('tab: next field  enter: save  …');
  });
});

describe('buildFrame', () => {
  it('draws the task list with the selection marker', () => {
    const frame = buildFrame(stateWith(sample), SIZE);
    expect(opAt(frame, 2, 5)).toEqual({ x: 2, y: 5, text: '>> 1. Alpha (Due: 2024-06-10)', style: 'redBold' });
    expect(opAt(frame, 2, 6)).toEqual({ x: 2, y: 6, text: '   2. Beta', style: 'plain' });
    expect(frame.lineAt(2).startsWith('│ Tasks │ Stats')).toBe(true);
  });

  it('shows a hint when there are no tasks', () => {
    const frame = buildFrame(stateWith([]), SIZE);
    expect(opAt(frame, 2, 5)?.text).toBe('No open tasks. Press + to add one.');
    expect(opAt(frame, 42, 15)?.text).toBe('No task selected');
  });

  it('shows the selected task in the detail panel', () => {
    const state = stateWith(sample);
    const frame = buildFrame(state, SIZE);
    expect(opAt(frame, 42, 15)?.text).toBe('Title: Alpha');
    expect(opAt(frame, 42, 17)?.text).toBe('Description:');
    expect(opAt(frame, 42, 18)?.text).toBe('first line');
    expect(opAt(frame, 42, 19)?.text).toBe('second');
    expect(opAt(frame, 42, 21)?.text).toBe('Due Date: 2024-06-10');
    expect(opAt(frame, 42, 23)?.text).toBe('Status: ○ Pending');

    state.taskScroll = 2;
    expect(opAt(buildFrame(state, SIZE), 42, 15)?.text).toBe('Description:');
  });

  it('draws three months and highlights the cursor only while the calendar is focused', () => {
    const state = stateWith(sample);
    state.calendar = { anchor: TODAY, cursor: '2024-06-20' };

    let frame = buildFrame(state, SIZE);
    expect(opAt(frame, 43, 5)?.text).toBe('May 2024');
    expect(opAt(frame, 69, 5)?.text).toBe('June 2024');
    expect(opAt(frame, 95, 5)?.text).toBe('July 2024');
    expect(opAt(frame, 87, 9)).toEqual({ x: 87, y: 9, text: '15', style: 'todayDay' });
    expect(opAt(frame, 81, 10)?.style).toBe('plain');

    state.panel = 'calendar';
    frame = buildFrame(state, SIZE);
    expect(opAt(frame, 81, 10)).toEqual({ x: 81, y: 10, text: '20', style: 'cursorDay' });
  });

  it('shows the notice in place of the key hints', () => {
    const state = stateWith([]);
    state.notice = 'Could not save tasks: memory: disk full';
    expect(opAt(buildFrame(state, SIZE), 1, 30)).toEqual({
      x: 1,
      y: 30,
      text: 'Could not save tasks: memory: disk full',
      style: 'redBold',
    });
  });

  it('draws the edit panel over the panels', () => {
    const state = stateWith(sample);
    state.mode = {
      kind: 'editingTitle',
      edit: { taskId: null, title: '', description: '', dueDate: null, dateInput: '', scroll: 0 },
    };
    const frame = buildFrame(state, SIZE);
    expect(opAt(frame, 20, 8)).toEqual({ x: 20, y: 8, text: 'New Task', style: 'cyanBold' });
    expect(opAt(frame, 20, 9)?.text).toBe('Title: ');
    expect(opAt(frame, 29, 9)).toEqual({ x: 29, y: 9, text: 'required', style: 'dim' });
  });

  it('draws the confirmation prompt with the chosen button highlighted', () => {
    const state = stateWith(sample);
    state.mode = { kind: 'confirmComplete', confirm: { taskId: 1, yesSelected: true } };
    const frame = buildFrame(state, SIZE);
    expect(opAt(frame, 32, 10)?.text).toBe('Complete Task');
    expect(opAt(frame, 32, 11)?.text).toBe('Mark this task as done?');
    expect(opAt(frame, 32, 13)?.text).toBe('Title: Alpha');
    expect(opAt(frame, 52, 21)).toEqual({ x: 52, y: 21, text: '[ Yes ]', style: 'inverse' });
    expect(opAt(frame, 63, 21)).toEqual({ x: 63, y: 21, text: '[ No ]', style: 'plain' });
  });

  it('draws counters on the Stats tab', () => {
    const state = stateWith(sample);
    state.tab = 'stats';
    const frame = buildFrame(state, SIZE);
    expect(opAt(frame, 2, 4)?.text).toBe('Overdue');
    expect(opAt(frame, 15, 6)).toEqual({ x: 15, y: 6, text: '1', style: 'redBold' });
    expect(opAt(frame, 2, 9)?.text).toBe('Activity (last 90 days)');
  });
});

describe('frame signatures across redraws', () => {
  it('stay equal while nothing changes and differ after a key moves the selection', () => {
    const state = stateWith(sample);
    const first = buildFrame(state, SIZE).signature();
    expect(buildFrame(state, SIZE).signature()).toBe(first);

    state.selectedIndex = 1;
    expect(buildFrame(state, SIZE).signature()).not.toBe(first);
  });
});
