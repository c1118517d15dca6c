import { boldText, dimText, supportsAnsiColor } from './terminal.js';

function formatSection(title: string, rows: [string, string][]): string {
  const width = Math.max(...rows.map(([left]) => left.length));
  const body = rows.map(([left, right]) => `  ${left.padEnd(width)}  ${right}`);
  return [boldText(`${title}:`), ...body].join('\n');
}

export function printHelp(message?: string): void {
  if (message) {
    console.error(message);
    console.error('');
  }

  const title = supportsAnsiColor
    ? `${boldText('tdui')} ${dimText('— terminal task tracker')}`
    : 'tdui — terminal task tracker';

  const lines = [
    title,
    '',
    'Usage: tdui [command] [options]',
    '',
    formatSection('Commands', [
      ['interactive (i)', 'Full-screen task tracker (default)'],
      ['list', 'Print open tasks in display order'],
      ['stats', 'Show task statistics'],
      ['help', 'Show this help'],
    ]),
    '',
    formatSection('Global flags', [
      ['--file, -f <path>', 'Task file (default: ~/.local/share/tdui/todos.json)'],
      ['--config, -c <path>', 'Path to config file (default: ~/.config/tdui/config.json)'],
      ['--help, -h', 'Show help'],
      ['--version, -v', 'Show version'],
    ]),
    '',
    formatSection('Keys', [
      ['+', 'New task'],
      ['enter', 'Edit selected task (list) / new task on day (calendar)'],
      ['d / -', 'Complete / delete selected task'],
      ['tab', 'Next panel (list, calendar, task)'],
      ['shift+←/→', 'Switch between Tasks and Stats'],
      ['t', 'Calendar: jump to today'],
      ['q / esc', 'Quit'],
    ]),
  ];

  const out = lines.join('\n');
  if (message) {
    console.error(out);
  } else {
    console.log(out);
  }
}

export function printVersion(version: string): void {
  console.log(version);
}
