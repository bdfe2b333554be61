import { stringify } from 'yaml';
import { ExportFormat } from '../types/export-format.js';
import { toRecord } from '../schema/task-file.js';
import type { Exporter } from './types.js';

export const yamlExporter: Exporter = {
  format: ExportFormat.Yaml,
  extension: '.yaml',
  render(tasks) {
    return stringify(tasks.map(toRecord));
  },
};
