import { isTaskOverdue, todayString } from '../parsers/date-parser.js';
import type { TaskRecord } from '../types/task.js';
import { roundHalfEven } from '../rounding.js';

export type ReportFilter = 'completed' | 'pending' | 'overdue';

export interface TaskReport {
  total: number;
  completed: number;
  pending: number;
  overdue: number;
  completionRate: number;
  tasks: TaskRecord[];
}

/**
 * Summarize a list of task records. `filter` picks which records are
 * returned in `tasks`; the counts always cover the whole list.
 */
export function generateTaskReport(
  records: readonly TaskRecord[],
  filter?: ReportFilter,
  today: string = todayString(),
): TaskReport {
  const completed = records.filter(r => r.status === 'completed');
  const pending = records.filter(r => r.status === 'pending');
  const overdue = records.filter(r => isTaskOverdue(r.due_date, r.status === 'completed', today));

  const total = records.length;
  const selected = filter === 'completed' ? completed
    : filter === 'pending' ? pending
      : filter === 'overdue' ? overdue
        : records;

  return {
    total,
    completed: completed.length,
    pending: pending.length,
    overdue: overdue.length,
    completionRate: total === 0 ? 0 : roundHalfEven((completed.length / total) * 100, 1),
    tasks: [...selected],
  };
}
