// Types
export * from './types/index.js';

// Errors
export {
  TaskdeckError,
  ValidationError,
  NotFoundError,
  ParseError,
  SchemaError,
  TaskIndexError,
  isTaskdeckError,
  getErrorMessage,
} from './errors.js';
export type { ErrorCode, ErrorContext } from './errors.js';

// Logging
export { LogBuffer } from './logger.js';
export type { Logger, LogEntry, LogLevel } from './logger.js';

// Configuration
export { getDefaultTaskFilePath, resolveTaskFilePath, TASK_FILE_ENV } from './config.js';

// Parsers
export * from './parsers/index.js';
export { roundHalfEven } from './rounding.js';

// Entities
export { Task } from './task.js';
export type { RawTaskRecord } from './task.js';
export { TaskManager, SORT_KEYS, UNCATEGORIZED, isSortKey } from './task-manager.js';
export type { SortKey, TaskManagerOptions } from './task-manager.js';

// Persistence
export * from './persistence/index.js';

// Formatting
export * from './format/index.js';
