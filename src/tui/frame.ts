import terminalKit from 'terminal-kit';
import type { Rect } from './layout.js';

export type Style =
  | 'plain'
  | 'bold'
  | 'dim'
  | 'inverse'
  | 'red'
  | 'redBold'
  | 'yellow'
  | 'yellowBold'
  | 'cyan'
  | 'cyanBold'
  | 'green'
  | 'border'
  | 'borderFocused'
  | 'field'
  | 'dueDay'
  | 'overdueDay'
  | 'todayDay'
  | 'cursorDay';

export interface DrawOp {
  x: number;
  y: number;
  text: string;
  style: Style;
}

export function textWidth(text: string): number {
  return terminalKit.stringWidth(text);
}

export function truncateByWidth(text: string, maxWidth: number): string {
  if (maxWidth <= 0) return '';
  if (textWidth(text) <= maxWidth) return text;
  let out = '';
  let used = 0;
  for (const ch of Array.from(text)) {
    const w = textWidth(ch);
    if (used + w > maxWidth - 1) break;
    out += ch;
    used += w;
  }
  return `${out}…`;
}

export function truncateStartByWidth(text: string, maxWidth: number): string {
  if (maxWidth <= 0) return '';
  if (textWidth(text) <= maxWidth) return text;

  const chars = Array.from(text);
  let width = 0;
  const out: string[] = [];
  for (let idx = chars.length - 1; idx >= 0; idx--) {
    const ch = chars[idx] ?? '';
    const w = textWidth(ch);
    if (width + w > maxWidth) break;
    out.push(ch);
    width += w;
  }
  return out.reverse().join('');
}

/**
 * Ordered list of draw operations; later operations paint over earlier ones, which is
 * how modals cover the panels underneath.
 */
export class Frame {
  readonly ops: DrawOp[] = [];

  constructor(
    readonly width: number,
    readonly height: number
  ) {}

  text(x: number, y: number, text: string, style: Style = 'plain', maxWidth?: number): number {
    if (y < 1 || y > this.height || x > this.width) return 0;
    const budget = Math.min(maxWidth ?? Number.POSITIVE_INFINITY, this.width - x + 1);
    const shown = truncateByWidth(text, budget);
    if (shown) this.ops.push({ x, y, text: shown, style });
    return textWidth(shown);
  }

  fill(rect: Rect, style: Style = 'plain'): void {
    if (rect.width <= 0) return;
    const blank = ' '.repeat(rect.width);
    for (let row = 0; row < rect.height; row++) {
      this.text(rect.x, rect.y + row, blank, style);
    }
  }

  box(rect: Rect, title: string, focused = false): void {
    if (rect.width < 2 || rect.height < 2) return;
    const style: Style = focused ? 'borderFocused' : 'border';
    const inner = rect.width - 2;
    this.text(rect.x, rect.y, `┌${'─'.repeat(inner)}┐`, style);
    for (let row = 1; row < rect.height - 1; row++) {
      this.text(rect.x, rect.y + row, '│', style);
      this.text(rect.x + rect.width - 1, rect.y + row, '│', style);
    }
    this.text(rect.x, rect.y + rect.height - 1, `└${'─'.repeat(inner)}┘`, style);
    if (title) this.text(rect.x + 1, rect.y, title, focused ? 'cyanBold' : 'bold', inner);
  }

  /** Identifies what this frame would put on screen; equal signatures paint identically. */
  signature(): string {
    const ops = this.ops.map((op) => `${op.x},${op.y},${op.style},${op.text}`);
    return [`${this.width}x${this.height}`, ...ops].join('\n');
  }

  /** Text of row `y` with styles dropped; gaps become spaces. */
  lineAt(y: number): string {
    const cells: string[] = [];
    for (const op of this.ops) {
      if (op.y !== y) continue;
      let col = op.x - 1;
      for (const ch of Array.from(op.text)) {
        while (cells.length < col) cells.push(' ');
        cells[col] = ch;
        col += Math.max(1, textWidth(ch));
      }
    }
    return cells.join('').trimEnd();
  }
}
