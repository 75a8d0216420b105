import type { Priority } from './priority.js';

export interface TaskStats {
  total: number;
  completed: number;
  pending: number;
  cancelled: number;
  overdue: number;
  /** Percentage of completed tasks, one decimal place; 0 when empty */
  completion_rate: number;
  categories: Record<string, number>;
  priorities: Record<Priority, number>;
}
