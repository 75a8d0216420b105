import { Command } from 'commander';
import { getShortId } from '@taskdeck/core';
import * as out from '../output.js';
import { openSession, parseDateArg, parsePriorityArg, $try } from '../helpers.js';

type AddOptions = {
  description?: string;
  due?: string;
  priority?: string;
  category?: string;
};

export function createAddCommand(): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<title>', 'Task title')
    .option('-d, --description <text>', 'Longer description')
    .option('--due <date>', 'Due date (YYYY-MM-DD, today, tomorrow, +3d, friday, jan15)')
    .option('-p, --priority <level>', 'Priority: low, medium or high')
    .option('-c, --category <name>', 'Category')
    .action((title: string, opts: AddOptions, cmd: Command) => $try(() => {
      // Reject bad input before touching the task file
      const dueDate = opts.due === undefined ? null : parseDateArg(opts.due);
      const priority = opts.priority === undefined ? undefined : parsePriorityArg(opts.priority);

      const { manager, save } = openSession(cmd);
      const task = manager.addTask(title, {
        description: opts.description,
        dueDate,
        priority,
        category: opts.category,
      });
      save();

      out.success(`Added task ${getShortId(task.id)}: ${task.title}`);
    }));
}
