import { ExportFormat } from '../types/export-format.js';
import { ExportError } from '../errors.js';

const FORMAT_ALIASES = new Map<string, ExportFormat>([
  ['json', ExportFormat.Json],
  ['csv', ExportFormat.Csv],
  ['yaml', ExportFormat.Yaml],
  ['yml', ExportFormat.Yaml],
  ['markdown', ExportFormat.Markdown],
  ['md', ExportFormat.Markdown],
]);

/** Parse an export format tag (case-insensitive) */
export function parseExportFormat(text: string): ExportFormat {
  const format = FORMAT_ALIASES.get(text.trim().toLowerCase());
  if (format === undefined) {
    throw new ExportError(`Unsupported export format "${text}": expected json, csv, yaml or markdown`);
  }
  return format;
}
