/**
 * tdui list - Print tasks in display order
 */

import type { Task } from '../schema/index.js';
import { formatTaskLabel, isActive, isOverdue } from '../editor/task-editor.js';
import { sortTasks } from '../tui/task-order.js';
import { systemClock, type Clock } from '../tui/app-state.js';
import { extractBooleanFlags, rejectUnknownArgs } from './flag-utils.js';
import { parseStorageFlags } from './storage-options.js';
import { dimText, redText, yellowText } from './terminal.js';

export function printListHelp(): void {
  console.log(`Usage: tdui list [options]

Print open tasks in the order the list panel shows them.

Options:
  --all                  Print every stored task, including completed and deleted ones
  --json                 Output as JSON
  --file, -f <path>      Task file
  --config, -c <path>    Path to config file
  -h, --help             Show help
`);
}

function statusMarker(task: Task): string {
  if (task.deleted) return '[-]';
  if (task.completed) return '[x]';
  return '[ ]';
}

export function formatTaskList(tasks: readonly Task[], today: string, options: { all: boolean }): string[] {
  if (tasks.length === 0) {
    return [dimText(options.all ? 'No tasks stored.' : 'No open tasks.')];
  }

  return tasks.map((task, i) => {
    const prefix = options.all ? `${statusMarker(task)} #${task.id}` : `${i + 1}.`;
    const line = `${prefix} ${formatTaskLabel(task)}`;
    if (!isActive(task)) return dimText(line);
    if (isOverdue(task, today)) return redText(line);
    if (task.dueDate === today) return yellowText(line);
    return line;
  });
}

export function handleListCommand(args: string[], clock: Clock = systemClock): void {
  const boolFlags = extractBooleanFlags(args, ['--all', '--json']);
  const { storage } = parseStorageFlags(args);
  rejectUnknownArgs('list', args);

  const all = boolFlags.has('--all');
  const persisted = storage.load();
  if (storage.lastLoadError) throw storage.lastLoadError;
  const tasks = all ? persisted : sortTasks(persisted.filter(isActive));

  if (boolFlags.has('--json')) {
    console.log(JSON.stringify(tasks, null, 2));
    return;
  }
  console.log(formatTaskList(tasks, clock.today(), { all }).join('\n'));
}
