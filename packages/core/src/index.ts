// Types
export { Priority, TaskFilter, matchesFilter, ExportFormat } from './types/index.js';
export type { TaskIndex, Task, IndexedTask, TaskStats } from './types/index.js';

// Errors
export {
  TodoError,
  InvalidInputError,
  IndexOutOfRangeError,
  CorruptStoreError,
  StoreIoError,
  ExportError,
} from './errors.js';
export type { TodoErrorKind } from './errors.js';

// Schema
export * from './schema/index.js';

// Parsers
export { parsePriority, parseExportFormat } from './parsers/index.js';

// Store
export { TaskStore } from './store/index.js';

// Queries
export * from './queries/index.js';

// Exporters
export {
  getExporter,
  renderTasks,
  writeExport,
  jsonExporter,
  csvExporter,
  yamlExporter,
  markdownExporter,
  escapeCsvField,
  toChecklistItem,
} from './exporters/index.js';
export type { Exporter } from './exporters/index.js';
