import type { Task } from '../schema/index.js';
import type { TaskStorage } from '../storage/task-storage.js';
import { nextTaskId } from '../editor/id-generator.js';
import { applyEdit, createTask, isActive, markDeleted, toggleCompleted, type TaskFields } from '../editor/task-editor.js';
import { formatLocalDate, parseIsoDate } from '../utils/date.js';
import { sortTasks } from './task-order.js';
import { clampSelection, selectById, selectNext, selectPrevious } from './selection.js';
import {
  createCalendarState,
  ensureCursor,
  moveCursor,
  resetToToday,
  type CalendarState,
  type CalendarStep,
} from './calendar-nav.js';
import { appendText, countLines, deleteLastChar, isDateInputChar } from './text-input.js';
import type { KeyInput, KeyModifiers } from './key-utils.js';

export type Panel = 'list' | 'calendar' | 'task';
export type Tab = 'tasks' | 'stats';

export const PANEL_ORDER: readonly Panel[] = ['list', 'calendar', 'task'];

/** Working copy of a task while the edit panel is open. */
export interface EditBuffer {
  /** null when creating a new task */
  taskId: number | null;
  title: string;
  description: string;
  dueDate: string | null;
  dateInput: string;
  /** First visible description line in the edit panel. */
  scroll: number;
}

export interface ConfirmPrompt {
  taskId: number;
  yesSelected: boolean;
}

export type Mode =
  | { kind: 'normal' }
  | { kind: 'editingTitle'; edit: EditBuffer }
  | { kind: 'editingDescription'; edit: EditBuffer }
  | { kind: 'editingDate'; edit: EditBuffer }
  | { kind: 'confirmComplete'; confirm: ConfirmPrompt }
  | { kind: 'confirmDelete'; confirm: ConfirmPrompt };

export type EditingMode = Extract<Mode, { edit: EditBuffer }>;
export type ConfirmMode = Extract<Mode, { confirm: ConfirmPrompt }>;

export interface Clock {
  now(): Date;
  /** Local calendar day, `YYYY-MM-DD`. */
  today(): string;
}

export const systemClock: Clock = {
  now: () => new Date(),
  today: () => formatLocalDate(new Date()),
};

export interface AppDeps {
  storage: TaskStorage;
  clock: Clock;
}

export interface AppState {
  mode: Mode;
  panel: Panel;
  tab: Tab;
  /** Everything in storage, completed and deleted tasks included. */
  persisted: Task[];
  /** Open tasks in display order. */
  tasks: Task[];
  selectedIndex: number | null;
  /** First visible description line in the task detail panel. */
  taskScroll: number;
  calendar: CalendarState;
  /** One-shot message for the footer; cleared by the next key. */
  notice: string | null;
  shouldQuit: boolean;
}

export const EDIT_DESCRIPTION_VISIBLE_LINES = 10;
const EDIT_SCROLL_STEP = 3;

const NORMAL: Mode = { kind: 'normal' };

export function createAppState(deps: AppDeps): AppState {
  const persisted = deps.storage.load();
  const tasks = sortTasks(persisted.filter(isActive));
  return {
    mode: NORMAL,
    panel: 'list',
    tab: 'tasks',
    persisted,
    tasks,
    selectedIndex: tasks.length > 0 ? 0 : null,
    taskScroll: 0,
    calendar: createCalendarState(deps.clock.today()),
    notice: null,
    shouldQuit: false,
  };
}

export function getSelectedTask(state: AppState): Task | null {
  if (state.selectedIndex === null) return null;
  return state.tasks[state.selectedIndex] ?? null;
}

export function isEditingMode(mode: Mode): mode is EditingMode {
  return mode.kind === 'editingTitle' || mode.kind === 'editingDescription' || mode.kind === 'editingDate';
}

export function isConfirmMode(mode: Mode): mode is ConfirmMode {
  return mode.kind === 'confirmComplete' || mode.kind === 'confirmDelete';
}

export function findTask(state: AppState, id: number): Task | null {
  return state.tasks.find((t) => t.id === id) ?? state.persisted.find((t) => t.id === id) ?? null;
}

function hasNoModifiers(mods: KeyModifiers): boolean {
  return !mods.ctrl && !mods.alt;
}

// ---------------------------------------------------------------------------
// Persistence

function persist(state: AppState, deps: AppDeps): void {
  const result = deps.storage.save(state.persisted);
  if (!result.ok) {
    state.notice = `Could not save tasks: ${result.error.message}`;
  }
}

// ---------------------------------------------------------------------------
// Panels, tabs and navigation

function nextPanel(state: AppState, today: string): void {
  const index = PANEL_ORDER.indexOf(state.panel);
  state.panel = PANEL_ORDER[(index + 1) % PANEL_ORDER.length] ?? 'list';
  if (state.panel === 'calendar') {
    state.calendar = ensureCursor(state.calendar, today);
  }
}

function toggleTab(state: AppState): void {
  state.tab = state.tab === 'tasks' ? 'stats' : 'tasks';
}

function moveSelection(state: AppState, direction: 'up' | 'down'): void {
  const length = state.tasks.length;
  state.selectedIndex =
    direction === 'up' ? selectPrevious(state.selectedIndex, length) : selectNext(state.selectedIndex, length);
  state.taskScroll = 0;
}

const ARROW_STEPS: Record<'up' | 'down' | 'left' | 'right', CalendarStep> = {
  up: 'weekAbove',
  down: 'weekBelow',
  left: 'previousDay',
  right: 'nextDay',
};

function navigate(state: AppState, arrow: 'up' | 'down' | 'left' | 'right', today: string): void {
  switch (state.panel) {
    case 'list':
      if (arrow === 'up' || arrow === 'down') moveSelection(state, arrow);
      return;
    case 'calendar':
      state.calendar = moveCursor(state.calendar, ARROW_STEPS[arrow], today);
      return;
    case 'task':
      if (arrow === 'up') state.taskScroll = Math.max(0, state.taskScroll - 1);
      if (arrow === 'down') state.taskScroll += 1;
      return;
  }
}

// ---------------------------------------------------------------------------
// Edit panel

function openEditor(state: AppState, edit: Omit<EditBuffer, 'dateInput' | 'scroll'>): void {
  state.mode = { kind: 'editingTitle', edit: { ...edit, dateInput: edit.dueDate ?? '', scroll: 0 } };
}

function openNewTask(state: AppState, dueDate: string | null): void {
  openEditor(state, { taskId: null, title: '', description: '', dueDate });
}

function openEditSelected(state: AppState): void {
  const task = getSelectedTask(state);
  if (!task) return;
  openEditor(state, { taskId: task.id, title: task.title, description: task.description, dueDate: task.dueDate });
}

function autoScrollDescription(edit: EditBuffer): void {
  const lines = countLines(edit.description);
  edit.scroll = lines > EDIT_DESCRIPTION_VISIBLE_LINES ? lines - EDIT_DESCRIPTION_VISIBLE_LINES + 1 : 0;
}

/**
 * Commit the edit buffer. An empty title closes the panel without touching anything.
 */
function saveEdit(state: AppState, edit: EditBuffer, deps: AppDeps): void {
  state.mode = NORMAL;
  if (edit.title.length === 0) return;

  let dueDate = edit.dueDate;
  const parsed = parseIsoDate(edit.dateInput);
  if (parsed) {
    dueDate = parsed;
  } else if (edit.dateInput.length > 0) {
    state.notice = `Ignored due date "${edit.dateInput}" (expected YYYY-MM-DD)`;
  }

  const fields: TaskFields = { title: edit.title, description: edit.description, dueDate };
  let taskId: number;
  if (edit.taskId !== null) {
    const editingId = edit.taskId;
    taskId = editingId;
    const update = (t: Task): Task => (t.id === editingId ? applyEdit(t, fields) : t);
    state.tasks = state.tasks.map(update);
    state.persisted = state.persisted.map(update);
  } else {
    taskId = nextTaskId(state.persisted);
    const task = createTask(taskId, fields, deps.clock.now());
    state.tasks = [...state.tasks, task];
    state.persisted = [...state.persisted, task];
  }

  state.tasks = sortTasks(state.tasks);
  state.selectedIndex = selectById(state.tasks, taskId) ?? clampSelection(state.selectedIndex, state.tasks.length);
  persist(state, deps);
}

// ---------------------------------------------------------------------------
// Complete / delete

function openConfirm(state: AppState, kind: ConfirmMode['kind']): void {
  const task = getSelectedTask(state);
  if (!task) return;
  state.mode = { kind, confirm: { taskId: task.id, yesSelected: true } };
}

function applyConfirmed(state: AppState, mode: ConfirmMode, deps: AppDeps): void {
  const { taskId } = mode.confirm;
  const now = deps.clock.now();
  state.persisted = state.persisted.map((t) => {
    if (t.id !== taskId) return t;
    return mode.kind === 'confirmComplete' ? toggleCompleted(t, now) : markDeleted(t);
  });
  persist(state, deps);

  state.tasks = state.tasks.filter((t) => t.id !== taskId);
  state.selectedIndex = clampSelection(state.selectedIndex, state.tasks.length);
}

// ---------------------------------------------------------------------------
// Per-mode key handling

function handleNormalKey(state: AppState, key: KeyInput, deps: AppDeps): void {
  const today = deps.clock.today();

  // Shift+Left/Right switch tabs whichever panel has focus.
  if ((key.code === 'left' || key.code === 'right') && key.mods.shift) {
    toggleTab(state);
    return;
  }

  if (key.code !== 'char') {
    switch (key.code) {
      case 'escape':
        state.shouldQuit = true;
        return;
      case 'tab':
        nextPanel(state, today);
        return;
      case 'up':
      case 'down':
      case 'left':
      case 'right':
        navigate(state, key.code, today);
        return;
      case 'enter':
        if (state.panel === 'list' && state.selectedIndex !== null) {
          openEditSelected(state);
        } else if (state.panel === 'calendar') {
          openNewTask(state, state.calendar.cursor);
        }
        return;
      default:
        return;
    }
  }

  if (key.mods.ctrl && key.char === 'c') {
    state.shouldQuit = true;
    return;
  }
  if (!hasNoModifiers(key.mods)) return;

  switch (key.char) {
    case 'q':
      state.shouldQuit = true;
      return;
    case '+':
      openNewTask(state, null);
      return;
    case 'd':
      if (state.panel === 'list') openConfirm(state, 'confirmComplete');
      return;
    case '-':
      if (state.panel === 'list') openConfirm(state, 'confirmDelete');
      return;
    case 't':
      if (state.panel === 'calendar') state.calendar = resetToToday(today);
      return;
  }
}

function handleEditingTitleKey(state: AppState, edit: EditBuffer, key: KeyInput, deps: AppDeps): void {
  switch (key.code) {
    case 'char':
      if (hasNoModifiers(key.mods)) edit.title = appendText(edit.title, key.char);
      return;
    case 'backspace':
      edit.title = deleteLastChar(edit.title);
      return;
    case 'tab':
      state.mode = { kind: 'editingDescription', edit };
      return;
    case 'enter':
      saveEdit(state, edit, deps);
      return;
    case 'escape':
      state.mode = NORMAL;
      return;
    default:
      return;
  }
}

function handleEditingDescriptionKey(state: AppState, edit: EditBuffer, key: KeyInput, deps: AppDeps): void {
  switch (key.code) {
    case 'char':
      if (key.mods.ctrl && key.char === 'u') {
        edit.scroll = Math.max(0, edit.scroll - EDIT_SCROLL_STEP);
      } else if (key.mods.ctrl && key.char === 'd') {
        edit.scroll += EDIT_SCROLL_STEP;
      } else if (hasNoModifiers(key.mods)) {
        edit.description = appendText(edit.description, key.char);
        autoScrollDescription(edit);
      }
      return;
    case 'backspace':
      edit.description = deleteLastChar(edit.description);
      autoScrollDescription(edit);
      return;
    case 'pageUp':
      edit.scroll = Math.max(0, edit.scroll - EDIT_SCROLL_STEP);
      return;
    case 'pageDown':
      edit.scroll += EDIT_SCROLL_STEP;
      return;
    case 'tab':
      state.mode = { kind: 'editingDate', edit };
      return;
    case 'enter':
      if (key.mods.alt) {
        edit.description = appendText(edit.description, '\n');
        autoScrollDescription(edit);
      } else {
        saveEdit(state, edit, deps);
      }
      return;
    case 'escape':
      state.mode = NORMAL;
      return;
    default:
      return;
  }
}

function handleEditingDateKey(state: AppState, edit: EditBuffer, key: KeyInput, deps: AppDeps): void {
  switch (key.code) {
    case 'char':
      if (hasNoModifiers(key.mods) && isDateInputChar(key.char)) {
        edit.dateInput = appendText(edit.dateInput, key.char);
      }
      return;
    case 'backspace':
      edit.dateInput = deleteLastChar(edit.dateInput);
      return;
    case 'tab':
      state.mode = { kind: 'editingTitle', edit };
      return;
    case 'enter':
      saveEdit(state, edit, deps);
      return;
    case 'escape':
      state.mode = NORMAL;
      return;
    default:
      return;
  }
}

function handleConfirmKey(state: AppState, mode: ConfirmMode, key: KeyInput, deps: AppDeps): void {
  switch (key.code) {
    case 'tab':
    case 'left':
    case 'right':
      mode.confirm.yesSelected = !mode.confirm.yesSelected;
      return;
    case 'enter':
      state.mode = NORMAL;
      if (mode.confirm.yesSelected) applyConfirmed(state, mode, deps);
      return;
    case 'escape':
      state.mode = NORMAL;
      return;
    default:
      return;
  }
}

/**
 * Process one key press against the current mode.
 */
export function handleKey(state: AppState, key: KeyInput, deps: AppDeps): void {
  state.notice = null;
  const mode = state.mode;
  switch (mode.kind) {
    case 'normal':
      handleNormalKey(state, key, deps);
      return;
    case 'editingTitle':
      handleEditingTitleKey(state, mode.edit, key, deps);
      return;
    case 'editingDescription':
      handleEditingDescriptionKey(state, mode.edit, key, deps);
      return;
    case 'editingDate':
      handleEditingDateKey(state, mode.edit, key, deps);
      return;
    case 'confirmComplete':
    case 'confirmDelete':
      handleConfirmKey(state, mode, key, deps);
      return;
    default: {
      const exhaustive: never = mode;
      void exhaustive;
    }
  }
}
