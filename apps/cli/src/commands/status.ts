import { Command } from 'commander';
import type { TaskId, TaskManager } from '@taskdeck/core';
import { getShortId } from '@taskdeck/core';
import * as out from '../output.js';
import { openSession, resolveTaskId, $try } from '../helpers.js';

type StatusChange = (manager: TaskManager, id: TaskId) => boolean;

function createStatusChangeCommand(name: string, description: string, label: string, apply: StatusChange): Command {
  return new Command(name)
    .description(description)
    .argument('<id>', 'Task id or unique id prefix')
    .action((id: string, _opts: unknown, cmd: Command) => $try(() => {
      const { manager, save } = openSession(cmd);
      const task = resolveTaskId(manager, id);
      apply(manager, task.id);
      save();

      out.success(`Task ${getShortId(task.id)} marked ${label}: ${task.title}`);
    }));
}

export function createCompleteCommand(): Command {
  return createStatusChangeCommand('complete', 'Mark a task completed', 'completed',
    (m, id) => m.markTaskCompleted(id));
}

export function createPendingCommand(): Command {
  return createStatusChangeCommand('pending', 'Mark a task pending again', 'pending',
    (m, id) => m.markTaskPending(id));
}

export function createCancelCommand(): Command {
  return createStatusChangeCommand('cancel', 'Mark a task cancelled', 'cancelled',
    (m, id) => m.markTaskCancelled(id));
}
