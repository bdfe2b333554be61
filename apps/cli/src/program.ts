import { Command } from 'commander';

import { createAddCommand } from './commands/add.js';
import { createListCommand } from './commands/list.js';
import { createCompleteCommand } from './commands/complete.js';
import { createRemoveCommand } from './commands/remove.js';
import { createResetCommand } from './commands/reset.js';
import { createExportCommand } from './commands/export.js';
import { createStatusCommand } from './commands/status.js';
import { DEFAULT_STORE_FILE, STORE_PATH_ENV } from './config.js';

/** Build the CLI program with every command registered */
export function createProgram(): Command {
  const program = new Command()
    .name('todo')
    .description('A simple task manager')
    .version('1.0.0')
    .allowExcessArguments(false)
    .option('-p, --path <file>', `Path to the save file (default: $${STORE_PATH_ENV} or ./${DEFAULT_STORE_FILE})`);

  program.addCommand(createAddCommand());
  program.addCommand(createListCommand());
  program.addCommand(createCompleteCommand());
  program.addCommand(createRemoveCommand());
  program.addCommand(createResetCommand());
  program.addCommand(createExportCommand());
  program.addCommand(createStatusCommand());

  // Default action (no command): show task list
  program.action((_opts: unknown, cmd: Command) => {
    cmd.commands.find(c => c.name() === 'list')?.parse(process.argv.slice(0, 2));
  });

  return program;
}
