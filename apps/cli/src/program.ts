import { Command } from 'commander';
import { TASK_FILE_ENV } from '@taskdeck/core';

import { createAddCommand } from './commands/add.js';
import { createListCommand } from './commands/list.js';
import { createShowCommand } from './commands/show.js';
import { createUpdateCommand } from './commands/update.js';
import { createCompleteCommand, createPendingCommand, createCancelCommand } from './commands/status.js';
import { createDeleteCommand } from './commands/delete.js';
import { createExportCommand, createImportCommand } from './commands/transfer.js';
import { createStatsCommand } from './commands/stats.js';

export function createProgram(): Command {
  const program = new Command()
    .name('taskdeck')
    .description('Personal task tracker')
    .version('1.0.0')
    .option('--file <path>', `Task file (default: $${TASK_FILE_ENV} or the per-user data file)`)
    .option('-v, --verbose', 'Also print informational log messages');

  // No command: show the task list
  program.addCommand(createListCommand(), { isDefault: true });
  program.addCommand(createAddCommand());
  program.addCommand(createShowCommand());
  program.addCommand(createUpdateCommand());
  program.addCommand(createCompleteCommand());
  program.addCommand(createPendingCommand());
  program.addCommand(createCancelCommand());
  program.addCommand(createDeleteCommand());
  program.addCommand(createExportCommand());
  program.addCommand(createImportCommand());
  program.addCommand(createStatsCommand());

  return program;
}
