import { Command } from 'commander';
import { completeTask, getTask, saveStore } from '@todo/core';
import * as out from '../output.js';
import { openStore, parseIndex, $try } from '../helpers.js';

export function createCompleteCommand(): Command {
  return new Command('complete')
    .description('Mark a task as completed')
    .argument('<index>', 'The task index, as shown by list')
    .action((indexArg: string, _opts: unknown, cmd: Command) => $try(() => {
      const index = parseIndex(indexArg);
      const store = openStore(cmd);
      if (getTask(store, index).completed) {
        out.info(`Task ${index} is already completed`);
        return;
      }
      completeTask(store, index);
      saveStore(store);
      out.success(`Completed task ${index}: ${getTask(store, index).title}`);
    }));
}
