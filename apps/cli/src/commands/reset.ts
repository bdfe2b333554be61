import { Command } from 'commander';
import { resetStore, saveStore } from '@todo/core';
import * as out from '../output.js';
import { openStore, $try } from '../helpers.js';

export function createResetCommand(): Command {
  return new Command('reset')
    .description('Remove all tasks')
    .action((_opts: unknown, cmd: Command) => $try(() => {
      const store = openStore(cmd);
      const count = resetStore(store);
      saveStore(store);
      out.success(`Removed ${count} task(s)`);
    }));
}
