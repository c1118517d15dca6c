import { textWidth, truncateStartByWidth, type Frame } from './frame.js';

/**
 * Draw `label[value|   ]` on one row. The visible part of the value keeps its tail, so the
 * insertion point at the end stays on screen.
 */
export function renderLabeledInputField(
  frame: Frame,
  options: {
    x: number;
    y: number;
    label: string;
    value: string;
    width: number;
    placeholder?: string;
    focused?: boolean;
  }
): { cursorCol: number } {
  const { x, y, label, width } = options;
  const value = options.value;
  const placeholder = options.placeholder ?? '';
  const focused = options.focused ?? true;

  const prefixWidth = frame.text(x, y, label, focused ? 'cyanBold' : 'bold', width);
  const available = Math.max(0, width - prefixWidth);
  if (available < 3) {
    // Not enough room for a bracketed field; show a cursor marker only.
    if (focused && available > 0) frame.text(x + prefixWidth, y, '|', 'cyan');
    return { cursorCol: x + Math.min(width, prefixWidth) };
  }

  const fieldWidth = available - 2;
  const cursorToken = focused ? '|' : '';
  const valueBudget = Math.max(0, fieldWidth - textWidth(cursorToken));
  let col = x + prefixWidth;

  col += frame.text(col, y, '[', 'dim');
  const fieldStart = col;

  if (value.length === 0 && placeholder) {
    if (cursorToken) col += frame.text(col, y, cursorToken, 'cyan');
    col += frame.text(col, y, truncateStartByWidth(placeholder, fieldStart + fieldWidth - col), 'dim');
  } else {
    const shown = truncateStartByWidth(value, valueBudget);
    if (shown) col += frame.text(col, y, shown, 'field');
    if (cursorToken) col += frame.text(col, y, cursorToken, 'cyan');
  }

  const pad = fieldStart + fieldWidth - col;
  if (pad > 0) frame.text(col, y, ' '.repeat(pad), 'field');
  frame.text(fieldStart + fieldWidth, y, ']', 'dim');

  return { cursorCol: col };
}
