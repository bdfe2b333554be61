import type { Task } from '../types/task.js';
import { ExportFormat } from '../types/export-format.js';
import type { Exporter } from './types.js';

const LINE_BREAK = /\r\n|\r|\n/g;

/** `- [x] title (Priority)` checklist line. Line breaks in the title become spaces. */
export function toChecklistItem(task: Task): string {
  const box = task.completed ? '[x]' : '[ ]';
  const title = task.title.replace(LINE_BREAK, ' ');
  const suffix = task.priority ? ` (${task.priority})` : '';
  return `- ${box} ${title}${suffix}`;
}

export const markdownExporter: Exporter = {
  format: ExportFormat.Markdown,
  extension: '.md',
  render(tasks) {
    return tasks.map(task => `${toChecklistItem(task)}\n`).join('');
  },
};
