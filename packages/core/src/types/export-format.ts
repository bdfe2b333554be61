export const ExportFormat = {
  Json: 'json',
  Csv: 'csv',
  Yaml: 'yaml',
  Markdown: 'markdown',
} as const;

export type ExportFormat = (typeof ExportFormat)[keyof typeof ExportFormat];
