import { Command } from 'commander';
import { getStats } from '@todo/core';
import * as out from '../output.js';
import { openStore, $try } from '../helpers.js';

export function createStatusCommand(): Command {
  return new Command('status')
    .description('Show how many tasks are completed and pending')
    .action((_opts: unknown, cmd: Command) => $try(() => {
      const store = openStore(cmd);
      out.info(`Store: ${store.path}`);
      out.info(out.formatStats(getStats(store)));
    }));
}
