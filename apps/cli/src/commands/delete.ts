import { Command } from 'commander';
import { getShortId } from '@taskdeck/core';
import * as out from '../output.js';
import { openSession, resolveTaskId, $try } from '../helpers.js';

export function createDeleteCommand(): Command {
  return new Command('delete')
    .description('Delete a task')
    .argument('<id>', 'Task id or unique id prefix')
    .option('-f, --force', 'Do not print the task being deleted')
    .action((id: string, opts: { force?: boolean }, cmd: Command) => $try(() => {
      const { manager, save } = openSession(cmd);
      const task = resolveTaskId(manager, id);

      if (!opts.force) console.log(out.formatTaskLine(task.toRecord(), { showId: true }));

      manager.deleteTask(task.id);
      save();
      out.success(`Deleted task ${getShortId(task.id)}`);
    }));
}
