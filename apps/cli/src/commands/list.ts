import { Command } from 'commander';
import type { Task } from '@taskdeck/core';
import { SORT_KEYS } from '@taskdeck/core';
import * as out from '../output.js';
import { openSession, parseDateArg, $try } from '../helpers.js';

type ListOptions = {
  status?: string;
  priority?: string;
  category?: string;
  due?: string;
  before?: string;
  after?: string;
  overdue?: boolean;
  search?: string;
  sort: string;
  reverse?: boolean;
  ids?: boolean;
  desc?: boolean;
};

export function createListCommand(): Command {
  return new Command('list')
    .description('List tasks')
    .option('-s, --status <status>', 'Only tasks with this status (pending, completed, cancelled)')
    .option('-p, --priority <level>', 'Only tasks with this priority')
    .option('-c, --category <name>', 'Only tasks in this category')
    .option('--due <date>', 'Only tasks due on this date')
    .option('--before <date>', 'Only tasks due before this date')
    .option('--after <date>', 'Only tasks due after this date')
    .option('--overdue', 'Only overdue tasks')
    .option('--search <text>', 'Only tasks whose title or description contains text')
    .option('--sort <key>', `Sort key (${SORT_KEYS.join(', ')})`, 'due_date')
    .option('-r, --reverse', 'Reverse the sort order')
    .option('--ids', 'Show short task ids')
    .option('--desc', 'Show descriptions')
    .action((opts: ListOptions, cmd: Command) => $try(() => {
      const { manager } = openSession(cmd);

      let selected = new Set<Task>(manager.getAllTasks());
      const narrow = (matches: Task[]): void => {
        const allowed = new Set(matches);
        selected = new Set([...selected].filter(t => allowed.has(t)));
      };

      if (opts.status !== undefined) narrow(manager.getTasksByStatus(opts.status));
      if (opts.priority !== undefined) narrow(manager.getTasksByPriority(opts.priority));
      if (opts.category !== undefined) narrow(manager.getTasksByCategory(opts.category));
      if (opts.due !== undefined) narrow(manager.getTasksByDueDate(parseDateArg(opts.due)));
      if (opts.before !== undefined) narrow(manager.getTasksDueBefore(parseDateArg(opts.before)));
      if (opts.after !== undefined) narrow(manager.getTasksDueAfter(parseDateArg(opts.after)));
      if (opts.overdue) narrow(manager.getOverdueTasks());
      if (opts.search !== undefined) narrow(manager.searchTasks(opts.search));

      const tasks = manager.sortTasks(opts.sort, opts.reverse ?? false).filter(t => selected.has(t));
      out.printTaskList(tasks.map(t => t.toRecord()), { showId: opts.ids, showDescription: opts.desc });
    }));
}
