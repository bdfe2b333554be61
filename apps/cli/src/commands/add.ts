import { Command } from 'commander';
import { addTask, parsePriority, saveStore } from '@todo/core';
import * as out from '../output.js';
import { openStore, $try } from '../helpers.js';

export function createAddCommand(): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<title...>', 'The task title')
    .option('-P, --priority <level>', 'Task priority (high, medium, low)')
    .action((words: string[], opts: { priority?: string }, cmd: Command) => $try(() => {
      const priority = opts.priority !== undefined ? parsePriority(opts.priority) : null;
      const store = openStore(cmd);
      const index = addTask(store, words.join(' '), priority);
      saveStore(store);
      out.success(`Task added at index ${index}. Use the list command to see your tasks`);
    }));
}
