/**
 * chalk-based terminal output.
 */

import chalk from 'chalk';
import {
  TaskStatus, Priority, PRIORITIES,
  formatTaskDisplay, isTaskOverdue, todayString, UNCATEGORIZED,
} from '@taskdeck/core';
import type { DisplayOptions, LogBuffer, TaskRecord, TaskStats } from '@taskdeck/core';

const LABEL_WIDTH = 13;

// --- Formatting functions ---

export function formatStatus(status: TaskStatus): string {
  switch (status) {
    case TaskStatus.Completed: return chalk.green('completed');
    case TaskStatus.Cancelled: return chalk.gray('cancelled');
    default: return chalk.yellow('pending');
  }
}

export function formatPriority(priority: Priority): string {
  switch (priority) {
    case Priority.High: return chalk.red.bold('high');
    case Priority.Low: return chalk.blue('low');
    default: return 'medium';
  }
}

/** formatTaskDisplay() with color: overdue red, completed green, cancelled dim */
export function formatTaskLine(record: TaskRecord, opts: DisplayOptions = {}): string {
  const today = opts.today ?? todayString();
  const line = formatTaskDisplay(record, { ...opts, today });

  if (record.status === TaskStatus.Completed) return chalk.green(line);
  if (record.status === TaskStatus.Cancelled) return chalk.dim(line);
  if (isTaskOverdue(record.due_date, false, today)) return chalk.red(line);
  return line;
}

function field(label: string, value: string): string {
  return `${chalk.bold(`${label}:`.padEnd(LABEL_WIDTH))}${value}`;
}

// --- Printing ---

export function printTaskList(records: readonly TaskRecord[], opts: DisplayOptions = {}): void {
  if (records.length === 0) {
    info('No tasks found.');
    return;
  }
  for (const record of records) console.log(formatTaskLine(record, opts));
}

export function printTaskDetail(record: TaskRecord, today: string = todayString()): void {
  const overdue = isTaskOverdue(record.due_date, record.status === TaskStatus.Completed, today);
  const due = record.due_date
    ? overdue ? chalk.red(`${record.due_date} (overdue)`) : record.due_date
    : chalk.dim('(none)');

  console.log(field('Title', chalk.bold(record.title)));
  console.log(field('ID', record.task_id));
  console.log(field('Status', formatStatus(record.status)));
  console.log(field('Priority', formatPriority(record.priority)));
  console.log(field('Category', record.category || chalk.dim('(none)')));
  console.log(field('Due', due));
  console.log(field('Created', record.created_at));
  if (record.description) console.log(field('Description', record.description));
}

export function printStats(stats: TaskStats): void {
  console.log(chalk.bold.underline('Tasks'));
  console.log(field('Total', String(stats.total)));
  console.log(field('Completed', chalk.green(String(stats.completed))));
  console.log(field('Pending', chalk.yellow(String(stats.pending))));
  console.log(field('Cancelled', chalk.gray(String(stats.cancelled))));
  console.log(field('Overdue', stats.overdue > 0 ? chalk.red(String(stats.overdue)) : '0'));
  console.log(field('Completion', `${stats.completion_rate}%`));

  console.log();
  console.log(chalk.bold.underline('Priorities'));
  for (const p of [...PRIORITIES].reverse()) {
    console.log(`  ${formatPriority(p)}: ${stats.priorities[p]}`);
  }

  const categories = Object.entries(stats.categories);
  if (categories.length === 0) return;
  console.log();
  console.log(chalk.bold.underline('Categories'));
  for (const [name, count] of categories) {
    console.log(`  ${name === UNCATEGORIZED ? chalk.dim(name) : name}: ${count}`);
  }
}

/**
 * Echo engine log entries to stderr. Warnings and errors always show;
 * info entries only when verbose. Returns the unsubscribe function.
 */
export function forwardLogs(buffer: LogBuffer, verbose: boolean): () => void {
  return buffer.onLog((entry) => {
    switch (entry.level) {
      case 'error': console.error(chalk.red(entry.message)); break;
      case 'warn': console.error(chalk.yellow(entry.message)); break;
      default: if (verbose) console.error(chalk.dim(entry.message));
    }
  });
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}
