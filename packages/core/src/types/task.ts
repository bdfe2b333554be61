import type { Priority } from './priority.js';

/** Position of a task in its store. Shifts down when an earlier task is removed. */
export type TaskIndex = number;

export interface Task {
  readonly title: string;
  readonly completed: boolean;
  readonly priority: Priority | null;
}

export interface IndexedTask {
  readonly index: TaskIndex;
  readonly task: Task;
}

export interface TaskStats {
  readonly total: number;
  readonly completed: number;
  readonly pending: number;
}
