/**
 * tdui interactive - Full-screen terminal UI
 */

import { runInteractiveTui } from '../tui/interactive.js';
import { rejectUnknownArgs } from './flag-utils.js';
import { parseStorageFlags } from './storage-options.js';

export function printInteractiveHelp(): void {
  console.log(`Usage: tdui [interactive] [options]

Launch the full-screen task tracker (the default command).

Options:
  --file, -f <path>      Task file (default: ~/.local/share/tdui/todos.json)
  --config, -c <path>    Path to config file
  -h, --help             Show help
`);
}

export async function handleInteractiveCommand(args: string[]): Promise<void> {
  const { config, storage } = parseStorageFlags(args);
  rejectUnknownArgs('interactive', args);
  await runInteractiveTui({ storage, config });
}
