import terminalKit from 'terminal-kit';
import type { Terminal } from 'terminal-kit';
import type { Config } from '../config/loader.js';
import type { TaskStorage } from '../storage/task-storage.js';
import { createAppState, handleKey, systemClock, type AppDeps, type Clock } from './app-state.js';
import { decodeTerminalKey } from './key-utils.js';
import { buildFrame } from './render.js';
import { paintFrame } from './paint.js';
import { setCursorVisible } from './term-cursor.js';

export interface TuiOptions {
  storage: TaskStorage;
  config: Config;
  clock?: Clock;
}

// Redraw even without input so "today" highlighting follows the wall clock.
const REDRAW_INTERVAL_MS = 1000;

export async function runInteractiveTui(options: TuiOptions): Promise<void> {
  const term: Terminal = terminalKit.terminal;
  const deps: AppDeps = { storage: options.storage, clock: options.clock ?? systemClock };
  const state = createAppState(deps);
  const loadError = options.storage.lastLoadError;
  if (loadError) {
    // Shown until the first key press; the next save replaces the unreadable file.
    state.notice = `Could not read tasks (${loadError.message}); starting empty`;
  }

  const colorsDisabled = Boolean(options.config.interactive?.colors?.disable);
  const weekStart = options.config.interactive?.weekStart ?? 'sunday';

  let lastSignature: string | null = null;

  // The timer redraws every second; only repaint when the screen would change.
  function render(force = false): void {
    const frame = buildFrame(state, {
      width: term.width,
      height: term.height,
      today: deps.clock.today(),
      weekStart,
    });
    const signature = frame.signature();
    if (!force && signature === lastSignature) return;
    lastSignature = signature;
    paintFrame(term, frame, colorsDisabled);
  }

  let resolveExit: () => void = () => undefined;
  const exitPromise = new Promise<void>((resolve) => {
    resolveExit = resolve;
  });

  const onKey = (name: string, _matches: string[], data: { isCharacter?: boolean } | undefined): void => {
    const key = decodeTerminalKey(name, data?.isCharacter ?? false);
    if (!key) return;

    try {
      handleKey(state, key, deps);
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      state.mode = { kind: 'normal' };
      state.notice = `Error: ${msg}`;
    }

    if (state.shouldQuit) {
      resolveExit();
      return;
    }
    render();
  };

  const onResize = (): void => {
    render(true);
  };

  term.fullscreen(true);
  term.grabInput(true);
  process.stdout.on('resize', onResize);
  term.on('key', onKey);
  const redrawTimer = setInterval(() => render(), REDRAW_INTERVAL_MS);

  try {
    render(true);
    await exitPromise;
  } finally {
    clearInterval(redrawTimer);
    term.removeListener('key', onKey);
    process.stdout.removeListener('resize', onResize);
    term.grabInput(false);
    term.fullscreen(false);
    setCursorVisible(term, true);
    term.styleReset();
    term.clear();
  }
}
