import { Command } from 'commander';
import { removeTask, saveStore } from '@todo/core';
import * as out from '../output.js';
import { openStore, parseIndex, $try } from '../helpers.js';

export function createRemoveCommand(): Command {
  return new Command('remove')
    .description('Remove a task (later tasks move up one index)')
    .argument('<index>', 'The task index, as shown by list')
    .action((indexArg: string, _opts: unknown, cmd: Command) => $try(() => {
      const index = parseIndex(indexArg);
      const store = openStore(cmd);
      const removed = removeTask(store, index);
      saveStore(store);
      out.success(`Removed task ${index}: ${removed.title}`);
    }));
}
