import { ExportFormat } from '../types/export-format.js';
import { serializeTasks } from '../schema/task-file.js';
import type { Exporter } from './types.js';

/** Same document the store persists */
export const jsonExporter: Exporter = {
  format: ExportFormat.Json,
  extension: '.json',
  render: serializeTasks,
};
