/**
 * Ordered task collection bound to a single JSON backing file.
 *
 * A task's identity is its position. Mutations only touch memory; callers
 * persist with save(), which rewrites the whole file through a temp file and
 * a rename. There is no locking: two processes saving the same path race,
 * and the last rename wins.
 */

import { readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import type { Task, TaskIndex, IndexedTask, TaskStats } from '../types/task.js';
import type { Priority } from '../types/priority.js';
import { TaskFilter, matchesFilter } from '../types/task-filter.js';
import { IndexOutOfRangeError, StoreIoError, errnoCode } from '../errors.js';
import { parseTaskFile, serializeTasks } from '../schema/task-file.js';
import { createTask, withCompleted } from '../queries/task-helpers.js';

export class TaskStore {
  private tasks: Task[];
  readonly path: string;

  private constructor(path: string, tasks: Task[]) {
    this.path = path;
    this.tasks = tasks;
  }

  /** A fresh store with no tasks, bound to `path` (nothing is written) */
  static empty(path: string): TaskStore {
    return new TaskStore(path, []);
  }

  /**
   * Load the store at `path`. A missing file yields an empty store;
   * a malformed one throws CorruptStoreError.
   */
  static load(path: string): TaskStore {
    let raw: string;
    try {
      raw = readFileSync(path, 'utf-8');
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return TaskStore.empty(path);
      throw new StoreIoError(path, 'read', err);
    }
    return new TaskStore(path, parseTaskFile(raw, path));
  }

  get length(): number {
    return this.tasks.length;
  }

  /** Copy of the current sequence */
  snapshot(): readonly Task[] {
    return [...this.tasks];
  }

  get(index: TaskIndex): Task {
    return this.tasks[this.checkIndex(index)] ?? this.outOfRange(index);
  }

  /** Append a task and return its index */
  add(title: string, priority: Priority | null = null): TaskIndex {
    this.tasks.push(createTask(title, priority));
    return this.tasks.length - 1;
  }

  /** Lazily yields (index, task) pairs in index order. Each call starts over. */
  *list(filter: TaskFilter = TaskFilter.All): Generator<IndexedTask, void, undefined> {
    for (let index = 0; index < this.tasks.length; index++) {
      const task = this.tasks[index];
      if (task && matchesFilter(task.completed, filter)) {
        yield { index, task };
      }
    }
  }

  complete(index: TaskIndex): void {
    const i = this.checkIndex(index);
    this.tasks[i] = withCompleted(this.get(i));
  }

  /** Remove the task at `index`; later tasks shift down by one */
  remove(index: TaskIndex): Task {
    const removed = this.get(index);
    this.tasks.splice(index, 1);
    return removed;
  }

  /** Drop every task. Returns how many were removed. */
  reset(): number {
    const count = this.tasks.length;
    this.tasks = [];
    return count;
  }

  stats(): TaskStats {
    const completed = this.tasks.filter(t => t.completed).length;
    return { total: this.tasks.length, completed, pending: this.tasks.length - completed };
  }

  /** Write the full sequence to `path` (the backing file by default) */
  save(path: string = this.path): void {
    const tmpPath = `${path}.tmp.${process.pid}`;
    try {
      writeFileSync(tmpPath, serializeTasks(this.tasks), 'utf-8');
      renameSync(tmpPath, path);
    } catch (err) {
      rmSync(tmpPath, { force: true });
      throw new StoreIoError(path, 'write', err);
    }
  }

  private checkIndex(index: TaskIndex): number {
    if (!Number.isInteger(index) || index < 0 || index >= this.tasks.length) {
      this.outOfRange(index);
    }
    return index;
  }

  private outOfRange(index: TaskIndex): never {
    throw new IndexOutOfRangeError(index, this.tasks.length);
  }
}
