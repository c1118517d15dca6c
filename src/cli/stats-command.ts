/**
 * tdui stats - Task counts and recent activity
 */

import { isActive } from '../editor/task-editor.js';
import { computeStats, type TaskStats } from '../tui/stats.js';
import { systemClock, type Clock } from '../tui/app-state.js';
import { extractBooleanFlags, rejectUnknownArgs } from './flag-utils.js';
import { parseStorageFlags } from './storage-options.js';
import { boldText, cyanText, redText } from './terminal.js';

export function printStatsHelp(): void {
  console.log(`Usage: tdui stats [options]

Show open, overdue, completed and deleted counts plus recent activity.

Options:
  --json                 Output as JSON
  --file, -f <path>      Task file
  --config, -c <path>    Path to config file
  -h, --help             Show help
`);
}

function sumLast(values: readonly number[], days: number): number {
  return values.slice(-days).reduce((acc, n) => acc + n, 0);
}

export function formatStats(stats: TaskStats): string[] {
  const { counts, activity } = stats;
  const overdue = String(counts.overdue);
  return [
    boldText('Tasks'),
    `  Overdue:   ${counts.overdue > 0 ? redText(overdue) : overdue}`,
    `  To do:     ${counts.todo}`,
    `  Done:      ${counts.done}`,
    `  Deleted:   ${counts.deleted}`,
    '',
    boldText('Activity'),
    `  Created:   ${cyanText(String(sumLast(activity.created, 7)))} last 7 days, ${sumLast(activity.created, 30)} last 30 days`,
    `  Completed: ${cyanText(String(sumLast(activity.completed, 7)))} last 7 days, ${sumLast(activity.completed, 30)} last 30 days`,
  ];
}

export function handleStatsCommand(args: string[], clock: Clock = systemClock): void {
  const boolFlags = extractBooleanFlags(args, ['--json']);
  const { storage } = parseStorageFlags(args);
  rejectUnknownArgs('stats', args);

  const persisted = storage.load();
  if (storage.lastLoadError) throw storage.lastLoadError;
  const stats = computeStats(persisted, persisted.filter(isActive), clock.today());

  if (boolFlags.has('--json')) {
    console.log(JSON.stringify(stats, null, 2));
    return;
  }
  console.log(formatStats(stats).join('\n'));
}
