import { Command } from 'commander';
import { TaskFilter, listTasks } from '@todo/core';
import * as out from '../output.js';
import { openStore, resolveFilter, $try } from '../helpers.js';

function emptyMessage(filter: TaskFilter): string {
  switch (filter) {
    case TaskFilter.Completed: return 'No completed tasks found';
    case TaskFilter.Pending: return 'No pending tasks found';
    default: return 'No tasks saved yet... use the add command to create one';
  }
}

export function createListCommand(): Command {
  return new Command('list')
    .description('List tasks')
    .option('-c, --completed', 'Show only completed tasks')
    .option('-u, --pending', 'Show only pending tasks')
    .action((opts: { completed?: boolean; pending?: boolean }, cmd: Command) => $try(() => {
      const filter = resolveFilter(opts.completed ?? false, opts.pending ?? false);
      if (filter === null) {
        out.error('Cannot use both --completed and --pending at the same time');
        process.exitCode = 1;
        return;
      }

      const store = openStore(cmd);
      let shown = 0;
      for (const entry of listTasks(store, filter)) {
        out.info(out.formatTaskLine(entry));
        shown++;
      }
      if (shown === 0) out.info(emptyMessage(filter));
    }));
}
