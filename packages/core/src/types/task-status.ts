export const TaskStatus = {
  Pending: 'pending',
  Completed: 'completed',
  Cancelled: 'cancelled',
} as const;

export type TaskStatus = (typeof TaskStatus)[keyof typeof TaskStatus];

export const TASK_STATUSES: readonly TaskStatus[] = [
  TaskStatus.Pending,
  TaskStatus.Completed,
  TaskStatus.Cancelled,
];

export function isTaskStatus(value: unknown): value is TaskStatus {
  return typeof value === 'string' && TASK_STATUSES.some(s => s === value);
}
