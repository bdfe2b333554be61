/**
 * Shape of the persisted store: a bare JSON array of task records.
 * No envelope and no version field.
 */

import { z } from 'zod';
import { Priority } from '../types/priority.js';
import type { Task } from '../types/task.js';
import { CorruptStoreError } from '../errors.js';

export const taskRecordSchema = z.object({
  title: z.string().refine(t => t.trim().length > 0, 'title must not be empty'),
  completed: z.boolean(),
  priority: z.enum([Priority.High, Priority.Medium, Priority.Low]).nullable().optional(),
});

export const taskFileSchema = z.array(taskRecordSchema);

export type TaskRecord = z.infer<typeof taskRecordSchema>;

/** Plain record with a fixed key order, so output is stable across runs */
export function toRecord(task: Task): { title: string; completed: boolean; priority: Priority | null } {
  return { title: task.title, completed: task.completed, priority: task.priority };
}

function fromRecord(record: TaskRecord): Task {
  return { title: record.title, completed: record.completed, priority: record.priority ?? null };
}

export function serializeTasks(tasks: readonly Task[]): string {
  return JSON.stringify(tasks.map(toRecord), null, 2) + '\n';
}

/** Parse file contents into tasks, or throw CorruptStoreError naming the first problem */
export function parseTaskFile(raw: string, path: string): Task[] {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new CorruptStoreError(path, 'not valid JSON', { cause: err });
  }

  const result = taskFileSchema.safeParse(data);
  if (!result.success) {
    throw new CorruptStoreError(path, formatIssue(result.error));
  }
  return result.data.map(fromRecord);
}

function formatIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'unexpected shape';
  if (issue.path.length === 0) return `expected an array of tasks (${issue.message})`;

  const location = issue.path
    .map(p => (typeof p === 'number' ? `[${p}]` : `.${p}`))
    .join('');
  return `at ${location}: ${issue.message}`;
}
