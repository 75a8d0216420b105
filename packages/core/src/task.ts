import { v4 as uuidv4 } from 'uuid';
import { ParseError, SchemaError, ValidationError } from './errors.js';
import { convertToDate, isTaskOverdue, todayString } from './parsers/date-parser.js';
import { normalizePriority } from './parsers/priority-parser.js';
import { statusFromRecord } from './parsers/status-parser.js';
import { Priority } from './types/priority.js';
import { TaskStatus, isTaskStatus } from './types/task-status.js';
import type { TaskId, TaskInit, TaskRecord } from './types/task.js';

/** A record as it arrives from disk: every field optional and untyped */
export type RawTaskRecord = { readonly [K in keyof TaskRecord]?: unknown };

const PRIORITY_MARKERS: Record<Priority, string> = {
  [Priority.Low]: '⭘',
  [Priority.Medium]: '⬤',
  [Priority.High]: '‼️',
};

function requireTitle(value: string): string {
  const trimmed = value.trim();
  if (!trimmed) throw new ValidationError('Task title cannot be empty');
  return trimmed;
}

/** Empty string means "no due date", same as null */
function normalizeDueDate(value: string | null | undefined): string | null {
  if (!value) return null;
  return convertToDate(value);
}

function optionalString(data: RawTaskRecord, key: keyof TaskRecord): string | undefined {
  const value = data[key];
  if (value == null) return undefined;
  if (typeof value !== 'string') {
    throw new ValidationError(`Field '${key}' must be a string`, { field: key, value });
  }
  return value;
}

export class Task {
  readonly id: TaskId;
  readonly createdAt: string;

  private _title: string;
  private _description: string;
  private _dueDate: string | null;
  private _priority: Priority;
  private _category: string;
  private _status: TaskStatus;

  constructor(init: TaskInit) {
    this._title = requireTitle(init.title);
    this._description = init.description ?? '';
    this._priority = normalizePriority(init.priority ?? '');
    this._category = init.category ?? '';
    this._dueDate = normalizeDueDate(init.dueDate);
    this._status = init.status ?? TaskStatus.Pending;
    this.id = init.id || uuidv4();
    this.createdAt = init.createdAt || new Date().toISOString();
  }

  get title(): string { return this._title; }
  get description(): string { return this._description; }
  get dueDate(): string | null { return this._dueDate; }
  get priority(): Priority { return this._priority; }
  get category(): string { return this._category; }
  get status(): TaskStatus { return this._status; }

  // Setters validate before assigning, so a rejected value leaves the field as it was.

  setTitle(value: string): void {
    this._title = requireTitle(value);
  }

  setDescription(value: string): void {
    this._description = value;
  }

  /** null clears the due date; any string must be a valid date */
  setDueDate(value: string | null): void {
    this._dueDate = convertToDate(value);
  }

  setPriority(value: string): void {
    this._priority = normalizePriority(value);
  }

  setCategory(value: string): void {
    this._category = value;
  }

  setStatus(value: TaskStatus): void {
    if (!isTaskStatus(value)) {
      throw new ValidationError(`Invalid status: ${String(value)}`, { value });
    }
    this._status = value;
  }

  markCompleted(): void {
    this._status = TaskStatus.Completed;
  }

  markPending(): void {
    this._status = TaskStatus.Pending;
  }

  markCancelled(): void {
    this._status = TaskStatus.Cancelled;
  }

  isCompleted(): boolean {
    return this._status === TaskStatus.Completed;
  }

  /** Due strictly before today and not completed. Cancelled tasks still count. */
  isOverdue(today: string = todayString()): boolean {
    return isTaskOverdue(this._dueDate, this.isCompleted(), today);
  }

  toRecord(): TaskRecord {
    return {
      task_id: this.id,
      title: this._title,
      description: this._description,
      due_date: this._dueDate,
      priority: this._priority,
      category: this._category,
      created_at: this.createdAt,
      status: this._status,
    };
  }

  toJSON(): TaskRecord {
    return this.toRecord();
  }

  /**
   * Rebuild a task from a stored record. An unknown status falls back to
   * pending; a missing title throws SchemaError; an unknown priority or a
   * bad date throws ValidationError.
   */
  static fromRecord(data: RawTaskRecord): Task {
    const title = optionalString(data, 'title');
    if (title === undefined) {
      throw new SchemaError('Task record is missing a title', { record: data });
    }

    return new Task({
      title,
      description: optionalString(data, 'description') ?? '',
      dueDate: optionalString(data, 'due_date') ?? null,
      priority: optionalString(data, 'priority') ?? Priority.Medium,
      category: optionalString(data, 'category') ?? '',
      id: optionalString(data, 'task_id'),
      createdAt: optionalString(data, 'created_at'),
      status: statusFromRecord(data.status),
    });
  }

  static fromJSON(text: string): Task {
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (err: unknown) {
      throw new ParseError('Task JSON is not valid', undefined, err);
    }
    if (typeof data !== 'object' || data === null || Array.isArray(data)) {
      throw new ParseError('Task JSON must be an object');
    }
    return Task.fromRecord(data);
  }

  /** Compact one-line summary: [✓] ‼️ Title (Due: 2026-01-01) */
  toString(): string {
    const statusMarker = this.isCompleted() ? '✓' : ' ';
    const due = this._dueDate ? ` (Due: ${this._dueDate})` : '';
    return `[${statusMarker}] ${PRIORITY_MARKERS[this._priority]} ${this._title}${due}`;
  }

  /** Debug form */
  inspect(): string {
    return `Task(id='${this.id}', title='${this._title}', `
      + `priority=${this._priority.toUpperCase()}, status=${this._status.toUpperCase()})`;
  }
}
