/**
 * Operations the command layer calls. Each works on an in-memory TaskStore;
 * nothing is persisted until saveStore().
 */

import type { Task, TaskIndex, IndexedTask, TaskStats } from '../types/task.js';
import type { Priority } from '../types/priority.js';
import type { ExportFormat } from '../types/export-format.js';
import { TaskFilter } from '../types/task-filter.js';
import { TaskStore } from '../store/task-store.js';
import { writeExport } from '../exporters/index.js';

/** Load the store at `path`, or an empty one if the file does not exist */
export function loadStore(path: string): TaskStore {
  return TaskStore.load(path);
}

export function saveStore(store: TaskStore, path?: string): void {
  store.save(path);
}

/** Append a task; returns its index */
export function addTask(store: TaskStore, title: string, priority: Priority | null = null): TaskIndex {
  return store.add(title, priority);
}

export function listTasks(store: TaskStore, filter: TaskFilter = TaskFilter.All): Iterable<IndexedTask> {
  return store.list(filter);
}

export function getTask(store: TaskStore, index: TaskIndex): Task {
  return store.get(index);
}

export function completeTask(store: TaskStore, index: TaskIndex): void {
  store.complete(index);
}

/** Remove a task and return it */
export function removeTask(store: TaskStore, index: TaskIndex): Task {
  return store.remove(index);
}

/** Clear every task; returns the number removed */
export function resetStore(store: TaskStore): number {
  return store.reset();
}

export function getStats(store: TaskStore): TaskStats {
  return store.stats();
}

/** Write a snapshot of the store to `destination`; never touches the backing file */
export function exportTasks(store: TaskStore, destination: string, format: ExportFormat): void {
  writeExport(store.snapshot(), destination, format, { backingPath: store.path });
}
