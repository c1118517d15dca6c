import { z } from 'zod';

const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');
const TimestampSchema = z.string().datetime({ offset: true });

/** A task as stored on disk (snake_case keys). */
export const TaskRecordSchema = z.object({
  id: z.number().int().positive(),
  title: z.string(),
  description: z.string().default(''),
  completed: z.boolean(),
  // Older records predate soft delete.
  deleted: z.boolean().default(false),
  created_at: TimestampSchema,
  due_date: IsoDateSchema.nullable().default(null),
  completed_at: TimestampSchema.nullable().default(null),
});
export type TaskRecord = z.output<typeof TaskRecordSchema>;

export const TaskSchema = TaskRecordSchema.transform((record) => ({
  id: record.id,
  title: record.title,
  description: record.description,
  completed: record.completed,
  deleted: record.deleted,
  createdAt: record.created_at,
  dueDate: record.due_date,
  completedAt: record.completed_at,
}));
export type Task = z.output<typeof TaskSchema>;

export const TaskFileSchema = z.array(TaskSchema);

export function toTaskRecord(task: Task): TaskRecord {
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    completed: task.completed,
    deleted: task.deleted,
    created_at: task.createdAt,
    due_date: task.dueDate,
    completed_at: task.completedAt,
  };
}
