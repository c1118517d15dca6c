import { CliUsageError } from './errors.js';

export type FlagMap = Partial<Record<string, string>>;

export function extractFlags(args: string[], keys: readonly string[]): FlagMap {
  const flags: FlagMap = {};
  let index = 0;
  while (index < args.length) {
    const token = args[index];
    if (token === undefined || !keys.includes(token)) {
      index += 1;
      continue;
    }
    const value = args[index + 1];
    if (value === undefined) {
      throw new CliUsageError(`Flag '${token}' requires a value.`);
    }
    flags[token] = value;
    args.splice(index, 2);
  }
  return flags;
}

export function extractBooleanFlags(args: string[], keys: readonly string[]): Set<string> {
  const flags = new Set<string>();
  let index = 0;
  while (index < args.length) {
    const token = args[index];
    if (token === undefined || !keys.includes(token)) {
      index += 1;
      continue;
    }
    flags.add(token);
    args.splice(index, 1);
  }
  return flags;
}

export function rejectUnknownArgs(command: string, args: readonly string[]): void {
  const [first] = args;
  if (first !== undefined) {
    throw new CliUsageError(`Unexpected argument for '${command}': ${first}`);
  }
}
