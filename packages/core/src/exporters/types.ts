import type { Task } from '../types/task.js';
import type { ExportFormat } from '../types/export-format.js';

/** Renders a task snapshot as text in one format. Implementations never mutate the tasks. */
export interface Exporter {
  readonly format: ExportFormat;
  /** Extension (with dot) for destinations derived from the backing path */
  readonly extension: string;
  render(tasks: readonly Task[]): string;
}
