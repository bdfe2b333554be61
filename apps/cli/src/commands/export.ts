import { Command } from 'commander';
import { exportTasks, getExporter, parseExportFormat } from '@todo/core';
import * as out from '../output.js';
import { resolveExportPath } from '../config.js';
import { openStore, $try } from '../helpers.js';

export function createExportCommand(): Command {
  return new Command('export')
    .description('Export all tasks to another format')
    .requiredOption('-f, --format <format>', 'Output format (json, csv, yaml, markdown)')
    .option('-o, --output <file>', 'Destination file (default: store path with the format\'s extension)')
    .action((opts: { format: string; output?: string }, cmd: Command) => $try(() => {
      const format = parseExportFormat(opts.format);
      const store = openStore(cmd);
      const destination = resolveExportPath(opts.output, store.path, getExporter(format));
      exportTasks(store, destination, format);
      out.success(`Exported ${store.length} task(s) to ${destination}`);
    }));
}
