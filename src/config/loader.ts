import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { getDefaultDataPath } from '../storage/file-storage.js';

export const ConfigSchema = z.object({
  dataFile: z.string().optional(),
  interactive: z
    .object({
      colors: z
        .object({
          disable: z.boolean().optional(),
        })
        .optional(),
      weekStart: z.enum(['sunday', 'monday']).optional(),
    })
    .optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

export function getGlobalConfigPath(): string {
  // Recompute each call so tests that stub HOME behave correctly.
  return path.join(process.env.HOME ?? process.env.USERPROFILE ?? '', '.config', 'tdui', 'config.json');
}

export function loadConfig(configPath?: string): Config {
  const pathToLoad = configPath ?? getGlobalConfigPath();

  if (!fs.existsSync(pathToLoad)) {
    return ConfigSchema.parse({});
  }

  try {
    const content = fs.readFileSync(pathToLoad, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    return ConfigSchema.parse(parsed);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in config file: ${pathToLoad}`);
    }
    throw error;
  }
}

export function resolveDataFile(config: Config, fileFlag?: string): string {
  return fileFlag ?? config.dataFile ?? getDefaultDataPath();
}
