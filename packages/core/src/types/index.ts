export { TaskStatus, TASK_STATUSES, isTaskStatus } from './task-status.js';
export { Priority, PriorityRank, PRIORITIES } from './priority.js';
export { TASK_RECORD_FIELDS } from './task.js';
export type { TaskId, TaskRecord, TaskFields, TaskUpdate, TaskInit } from './task.js';
export type { ParseResult } from './results.js';
export { isSuccess, unwrap } from './results.js';
export type { TaskStats } from './stats.js';
