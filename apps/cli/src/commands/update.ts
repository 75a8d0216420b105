import { Command } from 'commander';
import type { TaskUpdate } from '@taskdeck/core';
import { getShortId } from '@taskdeck/core';
import * as out from '../output.js';
import { openSession, parseDateArg, parsePriorityArg, resolveTaskId, $try } from '../helpers.js';

type UpdateOptions = {
  title?: string;
  description?: string;
  due?: string;
  priority?: string;
  category?: string;
};

export function createUpdateCommand(): Command {
  return new Command('update')
    .description('Change fields of a task')
    .argument('<id>', 'Task id or unique id prefix')
    .option('-t, --title <title>', 'New title')
    .option('-d, --description <text>', 'New description')
    .option('--due <date>', 'New due date')
    .option('-p, --priority <level>', 'New priority')
    .option('-c, --category <name>', 'New category')
    .action((id: string, opts: UpdateOptions, cmd: Command) => $try(() => {
      const update: TaskUpdate = {};
      if (opts.title !== undefined) update.title = opts.title;
      if (opts.description !== undefined) update.description = opts.description;
      if (opts.due !== undefined) update.dueDate = parseDateArg(opts.due);
      if (opts.priority !== undefined) update.priority = parsePriorityArg(opts.priority);
      if (opts.category !== undefined) update.category = opts.category;

      if (Object.keys(update).length === 0) {
        out.warning('Nothing to update. Pass at least one of --title, --description, --due, --priority, --category');
        return;
      }

      const { manager, save } = openSession(cmd);
      const task = resolveTaskId(manager, id);
      manager.updateTask(task.id, update);
      save();

      out.success(`Updated task ${getShortId(task.id)}: ${task.title}`);
    }));
}
