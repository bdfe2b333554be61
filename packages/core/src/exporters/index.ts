/**
 * Exporter registry. Each format is an independent module; adding one means
 * writing its Exporter and registering it here.
 */

import { writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { Task } from '../types/task.js';
import type { ExportFormat } from '../types/export-format.js';
import { ExportError, describeCause } from '../errors.js';
import type { Exporter } from './types.js';
import { jsonExporter } from './json-exporter.js';
import { csvExporter } from './csv-exporter.js';
import { yamlExporter } from './yaml-exporter.js';
import { markdownExporter } from './markdown-exporter.js';

const EXPORTERS: Readonly<Record<ExportFormat, Exporter>> = {
  json: jsonExporter,
  csv: csvExporter,
  yaml: yamlExporter,
  markdown: markdownExporter,
};

export function getExporter(format: ExportFormat): Exporter {
  if (!Object.hasOwn(EXPORTERS, format)) {
    throw new ExportError(`Unsupported export format "${String(format)}"`);
  }
  return EXPORTERS[format];
}

/** Render tasks in `format` without writing anything */
export function renderTasks(tasks: readonly Task[], format: ExportFormat): string {
  return getExporter(format).render(tasks);
}

/**
 * Render tasks and write them to `destination`.
 * `backingPath` is the store's own file, which an export may never overwrite.
 */
export function writeExport(
  tasks: readonly Task[],
  destination: string,
  format: ExportFormat,
  opts?: { backingPath?: string },
): void {
  if (opts?.backingPath && resolve(destination) === resolve(opts.backingPath)) {
    throw new ExportError(`Refusing to export over the store file ${opts.backingPath}`);
  }

  const content = renderTasks(tasks, format);
  try {
    writeFileSync(destination, content, 'utf-8');
  } catch (err) {
    throw new ExportError(`Could not write export to ${destination}: ${describeCause(err)}`, { cause: err });
  }
}

export type { Exporter } from './types.js';
export { jsonExporter } from './json-exporter.js';
export { csvExporter, escapeCsvField } from './csv-exporter.js';
export { yamlExporter } from './yaml-exporter.js';
export { markdownExporter, toChecklistItem } from './markdown-exporter.js';
