import type { TaskStatus } from './task-status.js';
import type { Priority } from './priority.js';

export type TaskId = string;

/**
 * Flat, serializable form of a task. Key names and order are the
 * on-disk layout shared by the JSON store and the CSV export.
 */
export interface TaskRecord {
  task_id: TaskId;
  title: string;
  description: string;
  due_date: string | null; // yyyy-MM-dd
  priority: Priority;
  category: string;
  created_at: string; // ISO string
  status: TaskStatus;
}

export const TASK_RECORD_FIELDS = [
  'task_id',
  'title',
  'description',
  'due_date',
  'priority',
  'category',
  'created_at',
  'status',
] as const satisfies readonly (keyof TaskRecord)[];

/** Optional fields accepted when a task is created */
export interface TaskFields {
  description?: string;
  dueDate?: string | null;
  priority?: string;
  category?: string;
}

/** Fields accepted by update. Omitted fields are left unchanged; a due date cannot be cleared here. */
export interface TaskUpdate {
  title?: string;
  description?: string;
  dueDate?: string;
  priority?: string;
  category?: string;
}

export interface TaskInit extends TaskFields {
  title: string;
  id?: TaskId;
  createdAt?: string;
  status?: TaskStatus;
}
