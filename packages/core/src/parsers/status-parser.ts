import { ValidationError } from '../errors.js';
import { TaskStatus, isTaskStatus } from '../types/task-status.js';
import { isSuccess } from '../types/results.js';
import type { ParseResult } from '../types/results.js';

/** Parse a status name ('pending', 'COMPLETED', ...) case-insensitively */
export function parseStatus(input: string): ParseResult<TaskStatus> {
  const normalized = input.trim().toLowerCase();
  if (isTaskStatus(normalized)) return { type: 'success', value: normalized };
  return {
    type: 'error',
    error: new ValidationError(
      `Invalid status: ${input}. Must be one of: pending, completed, cancelled`,
      { value: input },
    ),
  };
}

/**
 * Status as read from a stored record. Unknown or missing values fall
 * back to pending instead of failing the whole record.
 */
export function statusFromRecord(value: unknown): TaskStatus {
  if (typeof value !== 'string') return TaskStatus.Pending;
  const result = parseStatus(value);
  return isSuccess(result) ? result.value : TaskStatus.Pending;
}
