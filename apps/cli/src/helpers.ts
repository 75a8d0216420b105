/**
 * CLI helpers: session setup, id resolution, argument parsing, error handling.
 */

import type { Command } from 'commander';
import {
  LogBuffer, NotFoundError, TaskManager, ValidationError,
  getErrorMessage, parseDate, parsePriority, resolveTaskFilePath, unwrap,
} from '@taskdeck/core';
import type { Logger, Priority, Task } from '@taskdeck/core';
import * as out from './output.js';

export type GlobalOptions = {
  file?: string;
  verbose?: boolean;
};

export interface Session {
  manager: TaskManager;
  filePath: string;
  /** Persist the manager to filePath; throws when the write fails */
  save(): void;
}

/**
 * Open the task file, or start empty when it does not exist yet.
 * Malformed files are handled by the manager itself (logged, empty list).
 */
export function openManager(filePath: string, logger: Logger): TaskManager {
  try {
    return new TaskManager(filePath, { logger });
  } catch (err: unknown) {
    if (!(err instanceof NotFoundError)) throw err;
    return new TaskManager(undefined, { logger });
  }
}

/** Build the manager for one command run from the program's global options */
export function openSession(cmd: Command, env: NodeJS.ProcessEnv = process.env): Session {
  const g = cmd.optsWithGlobals<GlobalOptions>();
  const filePath = resolveTaskFilePath(g.file, env);

  const logs = new LogBuffer();
  out.forwardLogs(logs, g.verbose ?? false);
  const manager = openManager(filePath, logs);

  return {
    manager,
    filePath,
    save: () => {
      if (!manager.saveToFile(filePath)) {
        throw new Error(`Could not save tasks to ${filePath}`);
      }
    },
  };
}

/**
 * Find a task by full id or by a unique id prefix (as shown by `list --ids`).
 */
export function resolveTaskId(manager: TaskManager, ref: string): Task {
  const wanted = ref.trim();
  if (!wanted) throw new ValidationError('Task id cannot be empty');

  const exact = manager.getTaskById(wanted);
  if (exact) return exact;

  const matches = manager.filterTasks(t => t.id.startsWith(wanted));
  const [first] = matches;
  if (first && matches.length === 1) return first;
  if (matches.length > 1) {
    throw new ValidationError(`Task id '${wanted}' is ambiguous (${matches.length} matches)`, { ref: wanted });
  }
  throw new ValidationError(`No task found with id '${wanted}'`, { ref: wanted });
}

/** Parse a date argument (YYYY-MM-DD, today, tomorrow, +3d, friday, jan15) */
export function parseDateArg(input: string, now?: Date): string {
  const date = parseDate(input, now);
  if (date === null) {
    throw new ValidationError(
      `Invalid date '${input}'. Use YYYY-MM-DD, today, tomorrow, +3d, a weekday or jan15`,
      { value: input },
    );
  }
  return date;
}

export function parsePriorityArg(level: string): Priority {
  return unwrap(parsePriority(level));
}

/**
 * Run a command action, printing any error in red and flagging a
 * non-zero exit code.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    out.error(getErrorMessage(err));
    process.exitCode = 1;
  }
}
