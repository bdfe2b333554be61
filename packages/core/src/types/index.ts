export { Priority } from './priority.js';
export { TaskFilter, matchesFilter } from './task-filter.js';
export { ExportFormat } from './export-format.js';
export type { TaskIndex, Task, IndexedTask, TaskStats } from './task.js';
