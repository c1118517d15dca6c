import type { Terminal } from 'terminal-kit';

export function setCursorVisible(term: Terminal, visible: boolean): void {
  // terminal-kit shows the cursor again via hideCursor(false).
  term.hideCursor(!visible);
}
