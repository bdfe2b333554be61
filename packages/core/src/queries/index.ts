// Task helpers
export { createTask, withCompleted } from './task-helpers.js';

// Task queries
export {
  loadStore,
  saveStore,
  addTask,
  listTasks,
  getTask,
  completeTask,
  removeTask,
  resetStore,
  getStats,
  exportTasks,
} from './task-queries.js';
