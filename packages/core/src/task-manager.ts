/**
 * TaskManager: an ordered, in-memory task collection with querying,
 * sorting, statistics and JSON/CSV persistence.
 *
 * All operations are synchronous. There is no file locking: two managers
 * saving to the same path race and the last save wins.
 */

import { writeFileSync } from 'node:fs';
import { ParseError, SchemaError, TaskIndexError, ValidationError, getErrorMessage } from './errors.js';
import { LogBuffer } from './logger.js';
import type { Logger } from './logger.js';
import { requireDate, todayString } from './parsers/date-parser.js';
import { normalizePriority } from './parsers/priority-parser.js';
import { parseStatus } from './parsers/status-parser.js';
import { parseCsvRecords, stringifyCsv } from './persistence/csv.js';
import { ensureParentDir, readTaskFile, readTextFile, writeTaskFile } from './persistence/task-file.js';
import { Task } from './task.js';
import { Priority, PriorityRank } from './types/priority.js';
import { TaskStatus } from './types/task-status.js';
import { unwrap } from './types/results.js';
import { roundHalfEven } from './rounding.js';
import type { TaskStats } from './types/stats.js';
import { TASK_RECORD_FIELDS } from './types/task.js';
import type { TaskFields, TaskId, TaskRecord, TaskUpdate } from './types/task.js';

export const SORT_KEYS = ['due_date', 'priority', 'title', 'created_at', 'category'] as const;
export type SortKey = (typeof SORT_KEYS)[number];

export const UNCATEGORIZED = 'Uncategorized';

export interface TaskManagerOptions {
  /** Receives load/save diagnostics. Defaults to a silent LogBuffer. */
  logger?: Logger;
}

type Comparator = (a: Task, b: Task) => number;

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Tasks without a due date sort after every dated task */
const COMPARATORS: Record<SortKey, Comparator> = {
  due_date: (a, b) => {
    if (a.dueDate === b.dueDate) return 0;
    if (a.dueDate === null) return 1;
    if (b.dueDate === null) return -1;
    return compareStrings(a.dueDate, b.dueDate);
  },
  priority: (a, b) => PriorityRank[a.priority] - PriorityRank[b.priority],
  title: (a, b) => compareStrings(a.title.toLowerCase(), b.title.toLowerCase()),
  created_at: (a, b) => compareStrings(a.createdAt, b.createdAt),
  category: (a, b) => compareStrings(a.category.toLowerCase(), b.category.toLowerCase()),
};

export function isSortKey(value: string): value is SortKey {
  return SORT_KEYS.some(k => k === value);
}

export class TaskManager implements Iterable<Task> {
  private tasks: Task[] = [];
  private readonly logger: Logger;

  /**
   * Create a manager, optionally hydrated from a JSON task file.
   *
   * Malformed structure (bad JSON, no `tasks` key, a record without a
   * title) is logged and leaves the manager empty. A missing file
   * (NotFoundError) or a record with an invalid value (ValidationError)
   * reaches the caller, so a later save cannot overwrite the file.
   */
  constructor(filePath?: string, options: TaskManagerOptions = {}) {
    this.logger = options.logger ?? new LogBuffer();

    if (filePath) {
      try {
        this.loadFromFile(filePath);
      } catch (err: unknown) {
        if (!(err instanceof ParseError || err instanceof SchemaError)) throw err;
        this.logger.warn(`Error loading tasks from ${filePath}: ${err.message}`);
        this.logger.warn('Starting with an empty task list.');
        this.tasks = [];
      }
    }
  }

  /** Named form of the tolerant constructor */
  static open(filePath: string, options: TaskManagerOptions = {}): TaskManager {
    return new TaskManager(filePath, options);
  }

  getLogger(): Logger {
    return this.logger;
  }

  // ---------------------------------------------------------------------------
  // CRUD
  // ---------------------------------------------------------------------------

  addTask(title: string, fields: TaskFields = {}): Task {
    const task = new Task({ title, ...fields });
    this.tasks.push(task);
    return task;
  }

  getTaskById(id: TaskId): Task | undefined {
    return this.tasks.find(t => t.id === id);
  }

  /**
   * Apply the given fields to a task. Omitted fields stay as they are.
   * Every supplied value is validated before any is applied.
   * Returns undefined when no task has the id.
   */
  updateTask(id: TaskId, fields: TaskUpdate): Task | undefined {
    const task = this.getTaskById(id);
    if (!task) return undefined;

    // Stage on a throwaway task so a bad field cannot leave a partial update behind
    const staged = new Task({
      title: task.title,
      description: task.description,
      dueDate: task.dueDate,
      priority: task.priority,
      category: task.category,
      id: task.id,
      createdAt: task.createdAt,
      status: task.status,
    });
    this.applyUpdate(staged, fields);
    this.applyUpdate(task, fields);
    return task;
  }

  deleteTask(id: TaskId): boolean {
    const idx = this.tasks.findIndex(t => t.id === id);
    if (idx < 0) return false;
    this.tasks.splice(idx, 1);
    return true;
  }

  markTaskCompleted(id: TaskId): boolean {
    return this.withTask(id, t => t.markCompleted());
  }

  markTaskPending(id: TaskId): boolean {
    return this.withTask(id, t => t.markPending());
  }

  markTaskCancelled(id: TaskId): boolean {
    return this.withTask(id, t => t.markCancelled());
  }

  // ---------------------------------------------------------------------------
  // Queries (each returns a fresh array)
  // ---------------------------------------------------------------------------

  getAllTasks(): Task[] {
    return [...this.tasks];
  }

  getTasksByStatus(status: TaskStatus | string): Task[] {
    const wanted = unwrap(parseStatus(status));
    return this.tasks.filter(t => t.status === wanted);
  }

  getCompletedTasks(): Task[] {
    return this.getTasksByStatus(TaskStatus.Completed);
  }

  getPendingTasks(): Task[] {
    return this.getTasksByStatus(TaskStatus.Pending);
  }

  getCancelledTasks(): Task[] {
    return this.getTasksByStatus(TaskStatus.Cancelled);
  }

  getTasksByPriority(priority: Priority | string): Task[] {
    const wanted = normalizePriority(priority);
    return this.tasks.filter(t => t.priority === wanted);
  }

  getTasksByCategory(category: string): Task[] {
    const wanted = category.toLowerCase();
    return this.tasks.filter(t => t.category.toLowerCase() === wanted);
  }

  getTasksByDueDate(date: string): Task[] {
    const target = requireDate(date);
    return this.tasks.filter(t => t.dueDate === target);
  }

  getTasksDueBefore(date: string): Task[] {
    const target = requireDate(date);
    return this.tasks.filter(t => t.dueDate !== null && t.dueDate < target);
  }

  getTasksDueAfter(date: string): Task[] {
    const target = requireDate(date);
    return this.tasks.filter(t => t.dueDate !== null && t.dueDate > target);
  }

  getOverdueTasks(today: string = todayString()): Task[] {
    return this.tasks.filter(t => t.isOverdue(today));
  }

  /** Case-insensitive substring match against title or description */
  searchTasks(query: string): Task[] {
    const q = query.toLowerCase();
    return this.tasks.filter(t =>
      t.title.toLowerCase().includes(q) || t.description.toLowerCase().includes(q));
  }

  filterTasks(predicate: (task: Task) => boolean): Task[] {
    return this.tasks.filter(t => predicate(t));
  }

  /**
   * Stable sort into a new array; stored order is untouched.
   * With reverse, equal keys still keep their insertion order.
   */
  sortTasks(key: string = 'due_date', reverse = false): Task[] {
    if (!isSortKey(key)) {
      throw new ValidationError(
        `Invalid sort key: ${key}. Must be one of: ${SORT_KEYS.join(', ')}`,
        { key },
      );
    }
    const compare = COMPARATORS[key];
    return [...this.tasks].sort(reverse ? (a, b) => compare(b, a) : compare);
  }

  getStats(today: string = todayString()): TaskStats {
    const total = this.tasks.length;
    const completed = this.getCompletedTasks().length;

    // Counted in a Map: categories are free text and may shadow Object.prototype keys
    const categoryCounts = new Map<string, number>();
    for (const task of this.tasks) {
      const name = task.category || UNCATEGORIZED;
      categoryCounts.set(name, (categoryCounts.get(name) ?? 0) + 1);
    }

    const countPriority = (p: Priority) => this.tasks.filter(t => t.priority === p).length;
    const priorities: Record<Priority, number> = {
      [Priority.Low]: countPriority(Priority.Low),
      [Priority.Medium]: countPriority(Priority.Medium),
      [Priority.High]: countPriority(Priority.High),
    };

    return {
      total,
      completed,
      pending: this.getPendingTasks().length,
      cancelled: this.getCancelledTasks().length,
      overdue: this.getOverdueTasks(today).length,
      completion_rate: total === 0 ? 0 : roundHalfEven((completed / total) * 100, 1),
      categories: Object.fromEntries(categoryCounts),
      priorities,
    };
  }

  // ---------------------------------------------------------------------------
  // JSON persistence
  // ---------------------------------------------------------------------------

  /** Write all tasks as JSON. I/O failures are logged and reported as false. */
  saveToFile(filePath: string): boolean {
    try {
      writeTaskFile(filePath, this.tasks.map(t => t.toRecord()));
      this.logger.info(`Saved ${this.tasks.length} task(s) to ${filePath}`);
      return true;
    } catch (err: unknown) {
      this.logger.error(`Error saving tasks to ${filePath}: ${getErrorMessage(err)}`);
      return false;
    }
  }

  /**
   * Replace the collection with the contents of a JSON task file.
   * Throws NotFoundError, ParseError, SchemaError or ValidationError; the
   * collection is only replaced once every record has been read.
   */
  loadFromFile(filePath: string): boolean {
    const records = readTaskFile(filePath);
    this.tasks = records.map(r => Task.fromRecord(r));
    this.logger.info(`Loaded ${this.tasks.length} task(s) from ${filePath}`);
    return true;
  }

  /**
   * Append tasks from a JSON task file whose ids are not already present.
   * Returns the number of tasks added. Errors as for loadFromFile.
   */
  mergeFromFile(filePath: string): number {
    const records = readTaskFile(filePath);
    const existingIds = new Set(this.tasks.map(t => t.id));
    const added: Task[] = [];

    for (const record of records) {
      if (typeof record.task_id === 'string' && existingIds.has(record.task_id)) continue;
      const task = Task.fromRecord(record);
      added.push(task);
      existingIds.add(task.id);
    }

    this.tasks.push(...added);
    this.logger.info(`Merged ${added.length} task(s) from ${filePath}`);
    return added.length;
  }

  // ---------------------------------------------------------------------------
  // CSV
  // ---------------------------------------------------------------------------

  exportToCsv(filePath: string): boolean {
    const rows = this.tasks.map(t => {
      const record = t.toRecord();
      return TASK_RECORD_FIELDS.map(field => record[field] ?? '');
    });

    try {
      ensureParentDir(filePath);
      writeFileSync(filePath, stringifyCsv([[...TASK_RECORD_FIELDS], ...rows]), 'utf8');
      this.logger.info(`Exported ${rows.length} task(s) to ${filePath}`);
      return true;
    } catch (err: unknown) {
      this.logger.error(`Error exporting tasks to CSV ${filePath}: ${getErrorMessage(err)}`);
      return false;
    }
  }

  /**
   * Replace the collection with rows from a CSV file. Rows without a
   * title or failing validation are skipped. Returns false only when the
   * file cannot be read.
   */
  importFromCsv(filePath: string): boolean {
    let text: string;
    try {
      text = readTextFile(filePath);
    } catch (err: unknown) {
      this.logger.error(`Error importing tasks from CSV ${filePath}: ${getErrorMessage(err)}`);
      return false;
    }

    this.tasks = [];
    for (const row of parseCsvRecords(text)) {
      if (!('title' in row)) {
        this.logger.warn(`Skipping row missing title: ${JSON.stringify(row)}`);
        continue;
      }
      try {
        this.tasks.push(Task.fromRecord(row));
      } catch (err: unknown) {
        if (!(err instanceof ValidationError)) throw err;
        this.logger.warn(`Skipping row due to error: ${err.message}`);
      }
    }

    this.logger.info(`Imported ${this.tasks.length} task(s) from ${filePath}`);
    return true;
  }

  // ---------------------------------------------------------------------------
  // Container
  // ---------------------------------------------------------------------------

  get size(): number {
    return this.tasks.length;
  }

  get length(): number {
    return this.tasks.length;
  }

  [Symbol.iterator](): Iterator<Task> {
    return this.tasks[Symbol.iterator]();
  }

  /** Task at an index; negative indices count from the end */
  at(index: number): Task {
    const task = Number.isInteger(index) ? this.tasks.at(index) : undefined;
    if (!task) throw new TaskIndexError(index, this.tasks.length);
    return task;
  }

  toRecords(): TaskRecord[] {
    return this.tasks.map(t => t.toRecord());
  }

  private withTask(id: TaskId, fn: (task: Task) => void): boolean {
    const task = this.getTaskById(id);
    if (!task) return false;
    fn(task);
    return true;
  }

  private applyUpdate(task: Task, fields: TaskUpdate): void {
    if (fields.title !== undefined) task.setTitle(fields.title);
    if (fields.description !== undefined) task.setDescription(fields.description);
    if (fields.dueDate !== undefined) task.setDueDate(fields.dueDate);
    if (fields.priority !== undefined) task.setPriority(fields.priority);
    if (fields.category !== undefined) task.setCategory(fields.category);
  }
}
