import type { Terminal } from 'terminal-kit';
import type { Frame, Style } from './frame.js';

type Writer = (text: string) => void;

function stylePainters(term: Terminal, colorsDisabled: boolean): Record<Style, Writer> {
  const plain: Writer = (s) => term(s);
  if (colorsDisabled) {
    return {
      plain,
      bold: plain,
      dim: plain,
      inverse: (s) => term.inverse(s),
      red: plain,
      redBold: plain,
      yellow: plain,
      yellowBold: plain,
      cyan: plain,
      cyanBold: plain,
      green: plain,
      border: plain,
      borderFocused: plain,
      field: plain,
      dueDay: plain,
      overdueDay: plain,
      todayDay: (s) => term.underline(s),
      cursorDay: (s) => term.inverse(s),
    };
  }
  return {
    plain,
    bold: (s) => term.bold(s),
    dim: (s) => term.dim(s),
    inverse: (s) => term.inverse(s),
    red: (s) => term.red(s),
    redBold: (s) => term.bold.red(s),
    yellow: (s) => term.yellow(s),
    yellowBold: (s) => term.bold.yellow(s),
    cyan: (s) => term.cyan(s),
    cyanBold: (s) => term.bold.cyan(s),
    green: (s) => term.green(s),
    border: (s) => term.gray(s),
    borderFocused: (s) => term.cyan(s),
    field: (s) => term.bgGray.white(s),
    dueDay: (s) => term.bgGray.white(s),
    overdueDay: (s) => term.bgRed.white.bold(s),
    todayDay: (s) => term.bgCyan.black.bold(s),
    cursorDay: (s) => term.bgYellow.black.bold(s),
  };
}

/**
 * Write a frame to the terminal: clear, then replay the draw operations in order.
 */
export function paintFrame(term: Terminal, frame: Frame, colorsDisabled: boolean): void {
  const painters = stylePainters(term, colorsDisabled);
  term.hideCursor();
  term.clear();
  for (const op of frame.ops) {
    term.moveTo(op.x, op.y);
    painters[op.style](op.text);
    term.styleReset();
  }
}
