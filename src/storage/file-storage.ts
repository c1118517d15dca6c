import fs from 'node:fs';
import path from 'node:path';
import { TaskFileSchema, toTaskRecord, type Task } from '../schema/index.js';
import { StorageReadError, StorageWriteError } from './errors.js';
import type { SaveResult, TaskStorage } from './task-storage.js';

export function getDefaultDataPath(): string {
  // Recompute each call so tests that stub HOME behave correctly.
  const home = process.env.HOME ?? process.env.USERPROFILE ?? '.';
  return path.join(home, '.local', 'share', 'tdui', 'todos.json');
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * JSON file holding an array of task records. Keys are snake_case on disk and
 * camelCase in memory.
 */
export class FileStorage implements TaskStorage {
  /** Why the most recent load came back empty, if it failed. */
  lastLoadError: StorageReadError | null = null;

  constructor(readonly filePath: string = getDefaultDataPath()) {}

  load(): Task[] {
    this.lastLoadError = null;
    if (!fs.existsSync(this.filePath)) {
      return [];
    }

    try {
      const content = fs.readFileSync(this.filePath, 'utf-8');
      const result = TaskFileSchema.safeParse(JSON.parse(content));
      if (!result.success) {
        const issue = result.error.issues[0];
        const where = issue ? issue.path.join('.') : '';
        this.lastLoadError = new StorageReadError(
          this.filePath,
          `invalid task record${where ? ` at ${where}` : ''}: ${issue?.message ?? 'unknown issue'}`
        );
        return [];
      }
      return result.data;
    } catch (error) {
      const message = error instanceof SyntaxError ? 'invalid JSON' : describeError(error);
      this.lastLoadError = new StorageReadError(this.filePath, message);
      return [];
    }
  }

  save(tasks: readonly Task[]): SaveResult {
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(this.filePath, `${JSON.stringify(tasks.map(toTaskRecord), null, 2)}\n`, 'utf-8');
      return { ok: true };
    } catch (error) {
      return { ok: false, error: new StorageWriteError(this.filePath, describeError(error)) };
    }
  }
}
