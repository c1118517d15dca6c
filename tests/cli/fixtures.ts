import fs from 'node:fs';
import path from 'node:path';
import { toTaskRecord } from '../../src/schema/index.js';
import { makeTask } from '../helpers/memory-storage.js';

export const CLI_NOW = '2024-06-15T10:00:00.000Z';

export const sampleTasks = [
  makeTask({ id: 1, title: 'Water plants', dueDate: '2024-06-10', createdAt: '2024-06-14T12:00:00.000Z' }),
  makeTask({ id: 2, title: 'Call Sam', createdAt: '2024-06-01T12:00:00.000Z' }),
  makeTask({
    id: 3,
    title: 'Ship release',
    dueDate: '2024-06-15',
    createdAt: '2024-05-01T12:00:00.000Z',
    completed: true,
    completedAt: '2024-06-13T12:00:00.000Z',
  }),
  makeTask({ id: 4, title: 'Old idea', deleted: true, createdAt: '2024-06-15T12:00:00.000Z' }),
];

export function writeTaskFile(dir: string, records: unknown = sampleTasks.map(toTaskRecord)): string {
  const filePath = path.join(dir, 'todos.json');
  fs.writeFileSync(filePath, JSON.stringify(records, null, 2), 'utf-8');
  return filePath;
}
