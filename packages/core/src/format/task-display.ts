import { isTaskOverdue, todayString } from '../parsers/date-parser.js';
import type { TaskRecord } from '../types/task.js';

export interface DisplayOptions {
  showId?: boolean;
  showDescription?: boolean;
  /** Override today's date (yyyy-MM-dd) for the overdue label */
  today?: string;
}

const STATUS_MARKERS: Record<string, string> = {
  completed: '✓',
  pending: '□',
  cancelled: '✗',
};

const PRIORITY_MARKERS: Record<string, string> = {
  low: '⭘',
  medium: '⬤',
  high: '‼️',
};

const SHORT_ID_LENGTH = 8;
const DESCRIPTION_INDENT = '    ';

export function getShortId(id: string): string {
  return id.slice(0, SHORT_ID_LENGTH);
}

/**
 * One display line for a task record:
 * [□] ‼️ Title (OVERDUE: 2026-01-01) #work [ID: 1a2b3c4d]
 */
export function formatTaskDisplay(record: Partial<TaskRecord>, opts: DisplayOptions = {}): string {
  const title = record.title ?? 'Untitled';
  const status = (record.status ?? 'pending').toLowerCase();
  const priority = (record.priority ?? 'medium').toLowerCase();

  const statusMarker = Object.hasOwn(STATUS_MARKERS, status) ? STATUS_MARKERS[status] : '□';
  const priorityMarker = Object.hasOwn(PRIORITY_MARKERS, priority) ? PRIORITY_MARKERS[priority] : '⬤';
  let line = `[${statusMarker}] ${priorityMarker} ${title}`;

  if (record.due_date) {
    const overdue = isTaskOverdue(record.due_date, status === 'completed', opts.today ?? todayString());
    line += overdue ? ` (OVERDUE: ${record.due_date})` : ` (Due: ${record.due_date})`;
  }

  if (record.category) line += ` #${record.category}`;

  if (opts.showId && record.task_id) line += ` [ID: ${getShortId(record.task_id)}]`;

  if (opts.showDescription && record.description) {
    line += `\n${DESCRIPTION_INDENT}${record.description}`;
  }

  return line;
}

export function formatTaskList(records: readonly Partial<TaskRecord>[], opts: DisplayOptions = {}): string {
  if (records.length === 0) return 'No tasks found.';
  return records.map(r => formatTaskDisplay(r, opts)).join('\n');
}
