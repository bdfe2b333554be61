import type { Task } from '../types/task.js';
import type { Priority } from '../types/priority.js';
import { InvalidInputError } from '../errors.js';

/** Create a new pending Task. Rejects empty or whitespace-only titles. */
export function createTask(title: string, priority: Priority | null = null): Task {
  if (title.trim().length === 0) {
    throw new InvalidInputError('Task title must not be empty');
  }
  return { title, completed: false, priority };
}

/** Return the task marked completed; an already-completed task is returned as is */
export function withCompleted(task: Task): Task {
  if (task.completed) return task;
  return { ...task, completed: true };
}
