import { loadConfig, resolveDataFile, type Config } from '../config/loader.js';
import { FileStorage } from '../storage/file-storage.js';
import { extractFlags } from './flag-utils.js';

export interface StorageOptions {
  config: Config;
  storage: FileStorage;
}

/**
 * Consume `--config/-c` and `--file/-f` from `args` and open the task file they point at.
 */
export function parseStorageFlags(args: string[]): StorageOptions {
  const valueFlags = extractFlags(args, ['--config', '-c', '--file', '-f']);
  const config = loadConfig(valueFlags['--config'] ?? valueFlags['-c']);
  const dataFile = resolveDataFile(config, valueFlags['--file'] ?? valueFlags['-f']);
  return { config, storage: new FileStorage(dataFile) };
}
