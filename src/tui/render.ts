import type { Task } from '../schema/index.js';
import { formatTaskLabel, isOverdue } from '../editor/task-editor.js';
import { formatTimestamp } from '../utils/date.js';
import {
  EDIT_DESCRIPTION_VISIBLE_LINES,
  findTask,
  getSelectedTask,
  isConfirmMode,
  isEditingMode,
  type AppState,
  type ConfirmMode,
  type EditingMode,
  type Mode,
} from './app-state.js';
import { visibleMonths } from './calendar-nav.js';
import { buildMonthGrid, collectDueMarks, type CalendarCell, type WeekStart } from './calendar-grid.js';
import { Frame, textWidth, truncateByWidth, type Style } from './frame.js';
import { renderLabeledInputField } from './input-render.js';
import { centeredRect, computeLayout, innerRect, scrollOffsetFor, type Rect } from './layout.js';
import { computeStats } from './stats.js';

export interface RenderOptions {
  width: number;
  height: number;
  today: string;
  weekStart?: WeekStart;
}

const SPARK_CHARS = ['▁', '▂', '▃', '▄', '▅', '▆', '▇', '█'];

export function sparkline(values: readonly number[], width: number): string {
  const shown = width > 0 ? values.slice(-width) : [];
  const max = Math.max(0, ...shown);
  return shown
    .map((v) => {
      if (v <= 0 || max === 0) return ' ';
      const level = Math.ceil((v / max) * SPARK_CHARS.length) - 1;
      return SPARK_CHARS[Math.min(SPARK_CHARS.length - 1, Math.max(0, level))] ?? ' ';
    })
    .join('');
}

export function wrapText(text: string, width: number): string[] {
  if (width <= 0) return [];
  const out: string[] = [];
  for (const line of text.split('\n')) {
    let current = '';
    let used = 0;
    for (const ch of Array.from(line)) {
      const w = textWidth(ch);
      if (used + w > width) {
        out.push(current);
        current = '';
        used = 0;
      }
      current += ch;
      used += w;
    }
    out.push(current);
  }
  return out;
}

function joinHelpChunks(chunks: string[], width: number): string {
  if (width <= 0) return '';
  const sep = '  ';
  let out = '';
  let used = 0;

  for (const chunk of chunks) {
    const next = out ? `${out}${sep}${chunk}` : chunk;
    if (textWidth(next) > width) break;
    out = next;
    used++;
  }

  if (!out) return truncateByWidth(chunks[0] ?? '', width);
  if (used < chunks.length && textWidth(`${out}${sep}…`) <= width) out += `${sep}…`;
  return out;
}

export function getFooterHelp(mode: Mode, width: number): string {
  switch (mode.kind) {
    case 'normal':
      return joinHelpChunks(
        [
          '+: new',
          'd: done',
          '-: delete',
          'enter: edit/new on day',
          'tab: panels',
          't: today',
          'shift+←/→: tabs',
          'q: quit',
        ],
        width
      );
    case 'editingTitle':
    case 'editingDate':
      return joinHelpChunks(['tab: next field', 'enter: save', 'esc: cancel'], width);
    case 'editingDescription':
      return joinHelpChunks(
        ['tab: next field', 'enter: save', 'alt+enter: newline', 'ctrl+u/ctrl+d: scroll', 'esc: cancel'],
        width
      );
    case 'confirmComplete':
    case 'confirmDelete':
      return joinHelpChunks(['←/→: choose', 'enter: confirm', 'esc: cancel'], width);
  }
}

function taskStyle(task: Task, today: string, selected: boolean): Style {
  if (isOverdue(task, today)) return selected ? 'redBold' : 'red';
  if (task.dueDate === today) return selected ? 'yellowBold' : 'yellow';
  return selected ? 'bold' : 'plain';
}

function renderTabs(frame: Frame, state: AppState, rect: Rect): void {
  frame.box(rect, '');
  let col = rect.x + 2;
  const tabs: [AppState['tab'], string][] = [
    ['tasks', 'Tasks'],
    ['stats', 'Stats'],
  ];
  tabs.forEach(([tab, label], i) => {
    if (i > 0) col += frame.text(col, rect.y + 1, ' │ ', 'dim');
    col += frame.text(col, rect.y + 1, label, state.tab === tab ? 'cyanBold' : 'plain');
  });
}

function renderList(frame: Frame, state: AppState, rect: Rect, today: string): void {
  frame.box(rect, 'List', state.panel === 'list');
  const inner = innerRect(rect);
  if (state.tasks.length === 0) {
    frame.text(inner.x, inner.y, 'No open tasks. Press + to add one.', 'dim', inner.width);
    return;
  }

  const offset = scrollOffsetFor(state.selectedIndex, inner.height);
  for (let row = 0; row < inner.height; row++) {
    const index = offset + row;
    const task = state.tasks[index];
    if (!task) break;
    const selected = index === state.selectedIndex;
    const marker = selected ? '>> ' : '   ';
    frame.text(
      inner.x,
      inner.y + row,
      `${marker}${index + 1}. ${formatTaskLabel(task)}`,
      taskStyle(task, today, selected),
      inner.width
    );
  }
}

function dayStyle(cell: CalendarCell): Style {
  if (cell.isCursor) return 'cursorDay';
  if (cell.isToday) return 'todayDay';
  if (cell.due === 'overdue') return 'overdueDay';
  if (cell.due === 'due') return 'dueDay';
  return 'plain';
}

function renderCalendar(frame: Frame, state: AppState, rect: Rect, options: RenderOptions): void {
  const focused = state.panel === 'calendar';
  frame.box(rect, 'Calendar', focused);
  const inner = innerRect(rect);
  const columnWidth = Math.floor(inner.width / 3);
  const dueMarks = collectDueMarks(state.tasks, options.today);

  visibleMonths(state.calendar.anchor).forEach((ym, i) => {
    const grid = buildMonthGrid(ym, {
      today: options.today,
      cursor: focused ? state.calendar.cursor : null,
      dueMarks,
      weekStart: options.weekStart,
    });
    const x = inner.x + i * columnWidth + 1;
    const budget = columnWidth - 1;
    frame.text(x, inner.y, grid.title, i === 1 ? 'bold' : 'plain', budget);
    frame.text(x, inner.y + 1, grid.weekdays.join(' '), 'dim', budget);

    grid.weeks.forEach((week, w) => {
      const y = inner.y + 2 + w;
      if (y >= inner.y + inner.height) return;
      week.forEach((cell, d) => {
        if (!cell || d * 3 + 2 > budget) return;
        frame.text(x + d * 3, y, String(cell.day).padStart(2, ' '), dayStyle(cell));
      });
    });
  });
}

export function taskDetailLines(task: Task, width: number): { text: string; style: Style }[] {
  const lines: { text: string; style: Style }[] = [];
  lines.push({ text: `Title: ${task.title}`, style: 'bold' });
  lines.push({ text: '', style: 'plain' });
  lines.push({ text: 'Description:', style: 'bold' });
  for (const line of wrapText(task.description, width)) lines.push({ text: line, style: 'plain' });
  lines.push({ text: '', style: 'plain' });
  lines.push({ text: `Due Date: ${task.dueDate ?? 'Not set'}`, style: 'plain' });
  lines.push({ text: `Created: ${formatTimestamp(task.createdAt)}`, style: 'dim' });
  lines.push({
    text: task.completed ? 'Status: ✓ Completed' : 'Status: ○ Pending',
    style: task.completed ? 'green' : 'yellow',
  });
  return lines;
}

function renderDetail(frame: Frame, state: AppState, rect: Rect): void {
  frame.box(rect, 'Task', state.panel === 'task');
  const inner = innerRect(rect);
  const task = getSelectedTask(state);
  if (!task) {
    frame.text(inner.x, inner.y, 'No task selected', 'dim', inner.width);
    return;
  }
  const lines = taskDetailLines(task, inner.width).slice(state.taskScroll);
  lines.slice(0, inner.height).forEach((line, row) => {
    frame.text(inner.x, inner.y + row, line.text, line.style, inner.width);
  });
}

function renderStats(frame: Frame, state: AppState, rect: Rect, today: string): void {
  const stats = computeStats(state.persisted, state.tasks, today);
  const counters: [string, number, Style][] = [
    ['Overdue', stats.counts.overdue, stats.counts.overdue > 0 ? 'redBold' : 'cyanBold'],
    ['ToDo', stats.counts.todo, 'yellowBold'],
    ['Done', stats.counts.done, 'cyanBold'],
    ['Deleted', stats.counts.deleted, 'cyanBold'],
  ];

  const counterHeight = Math.min(5, rect.height);
  const counterWidth = Math.floor(rect.width / counters.length);
  counters.forEach(([title, count, style], i) => {
    const box: Rect = { x: rect.x + i * counterWidth, y: rect.y, width: counterWidth, height: counterHeight };
    frame.box(box, title);
    const inner = innerRect(box);
    const label = String(count);
    const x = inner.x + Math.max(0, Math.floor((inner.width - label.length) / 2));
    frame.text(x, inner.y + Math.floor(inner.height / 2), label, style);
  });

  const activity: Rect = {
    x: rect.x,
    y: rect.y + counterHeight,
    width: rect.width,
    height: rect.height - counterHeight,
  };
  if (activity.height < 3) return;
  frame.box(activity, 'Activity (last 90 days)');
  const inner = innerRect(activity);
  const labelWidth = 11;
  const series: [string, number[], Style][] = [
    ['Created', stats.activity.created, 'cyan'],
    ['Completed', stats.activity.completed, 'green'],
    ['Overdue', stats.activity.overdue, 'red'],
  ];
  series.forEach(([label, values, style], i) => {
    const y = inner.y + i * 2;
    if (y >= inner.y + inner.height) return;
    frame.text(inner.x, y, label, 'bold', labelWidth);
    frame.text(inner.x + labelWidth, y, sparkline(values, inner.width - labelWidth - 8), style);
    const peak = Math.max(0, ...values);
    frame.text(inner.x + inner.width - 7, y, `max ${peak}`, 'dim', 7);
  });
}

function renderEditor(frame: Frame, mode: EditingMode, area: Rect): void {
  const edit = mode.edit;
  const rect = centeredRect(70, 70, area);
  frame.fill(rect);
  frame.box(rect, edit.taskId === null ? 'New Task' : 'Edit Task', true);
  const inner = innerRect(rect);
  let y = inner.y;

  renderLabeledInputField(frame, {
    x: inner.x,
    y,
    label: 'Title: ',
    value: edit.title,
    width: inner.width,
    placeholder: 'required',
    focused: mode.kind === 'editingTitle',
  });
  y += 2;

  const describing = mode.kind === 'editingDescription';
  frame.text(inner.x, y, 'Description:', describing ? 'cyanBold' : 'bold');
  y += 1;
  const visible = Math.max(1, Math.min(EDIT_DESCRIPTION_VISIBLE_LINES, inner.height - 6));
  const lines = edit.description.split('\n');
  const shown = lines.slice(edit.scroll, edit.scroll + visible);
  shown.forEach((line, row) => {
    const isLast = edit.scroll + row === lines.length - 1;
    const width = frame.text(inner.x, y + row, line, 'plain', inner.width - 1);
    if (describing && isLast) frame.text(inner.x + width, y + row, '|', 'cyan');
  });
  y += visible + 1;

  renderLabeledInputField(frame, {
    x: inner.x,
    y,
    label: 'Due (YYYY-MM-DD): ',
    value: edit.dateInput,
    width: inner.width,
    placeholder: 'optional',
    focused: mode.kind === 'editingDate',
  });
}

function renderConfirm(frame: Frame, state: AppState, mode: ConfirmMode, area: Rect): void {
  const completing = mode.kind === 'confirmComplete';
  const rect = centeredRect(50, 50, area);
  frame.fill(rect);
  frame.box(rect, completing ? 'Complete Task' : 'Delete Task', true);
  const inner = innerRect(rect);
  const task = findTask(state, mode.confirm.taskId);

  frame.text(inner.x, inner.y, completing ? 'Mark this task as done?' : 'Delete this task?', 'bold', inner.width);
  if (task) {
    frame.text(inner.x, inner.y + 2, `Title: ${task.title}`, 'plain', inner.width);
    frame.text(inner.x, inner.y + 3, `Due Date: ${task.dueDate ?? 'Not set'}`, 'plain', inner.width);
    const room = Math.max(0, inner.height - 7);
    wrapText(task.description, inner.width)
      .slice(0, room)
      .forEach((line, i) => frame.text(inner.x, inner.y + 5 + i, line, 'dim', inner.width));
  }

  const buttonsY = inner.y + inner.height - 1;
  const yes = '[ Yes ]';
  const no = '[ No ]';
  const total = textWidth(yes) + 4 + textWidth(no);
  const x = inner.x + Math.max(0, Math.floor((inner.width - total) / 2));
  frame.text(x, buttonsY, yes, mode.confirm.yesSelected ? 'inverse' : 'plain');
  frame.text(x + textWidth(yes) + 4, buttonsY, no, mode.confirm.yesSelected ? 'plain' : 'inverse');
}

/**
 * Lay out the whole screen for the current state. Pure: reads state, returns draw operations.
 */
export function buildFrame(state: AppState, options: RenderOptions): Frame {
  const layout = computeLayout(options.width, options.height);
  const frame = new Frame(Math.max(20, options.width), layout.footerY);

  renderTabs(frame, state, layout.tabs);
  if (state.tab === 'tasks') {
    renderList(frame, state, layout.list, options.today);
    renderCalendar(frame, state, layout.calendar, options);
    renderDetail(frame, state, layout.detail);
  } else {
    renderStats(frame, state, layout.content, options.today);
  }

  if (state.notice) {
    frame.text(1, layout.footerY, state.notice, 'redBold');
  } else {
    frame.text(1, layout.footerY, getFooterHelp(state.mode, frame.width), 'dim');
  }

  const mode = state.mode;
  if (isEditingMode(mode)) renderEditor(frame, mode, layout.content);
  if (isConfirmMode(mode)) renderConfirm(frame, state, mode, layout.content);

  return frame;
}
