import type { Task } from '../types/task.js';
import { ExportFormat } from '../types/export-format.js';
import type { Exporter } from './types.js';

const HEADER = ['title', 'completed', 'priority'] as const;
const NEEDS_QUOTING = /[",\r\n]/;

/** Quote a field when it holds a delimiter, quote or line break (RFC 4180) */
export function escapeCsvField(value: string): string {
  if (!NEEDS_QUOTING.test(value)) return value;
  return `"${value.replace(/"/g, '""')}"`;
}

function toRow(task: Task): string {
  return [task.title, String(task.completed), task.priority ?? '']
    .map(escapeCsvField)
    .join(',');
}

export const csvExporter: Exporter = {
  format: ExportFormat.Csv,
  extension: '.csv',
  render(tasks) {
    const lines = [HEADER.join(','), ...tasks.map(toRow)];
    return lines.map(line => `${line}\n`).join('');
  },
};
