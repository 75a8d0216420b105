/**
 * Error hierarchy for the task engine.
 * Every error carries a stable code so collaborators can branch without
 * matching on message text.
 */

export type ErrorCode =
  | 'VALIDATION_FAILED'
  | 'FILE_NOT_FOUND'
  | 'PARSE_FAILED'
  | 'SCHEMA_INVALID'
  | 'INDEX_OUT_OF_RANGE';

export type ErrorContext = Record<string, unknown>;

export interface TaskdeckErrorOptions {
  code: ErrorCode;
  message: string;
  context?: ErrorContext;
  cause?: unknown;
}

/**
 * Base class for all engine errors
 */
export class TaskdeckError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: ErrorContext;

  constructor(options: TaskdeckErrorOptions) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code;
    this.context = options.context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/** Bad title, date, priority, status or sort key */
export class ValidationError extends TaskdeckError {
  constructor(message: string, context?: ErrorContext) {
    super({ code: 'VALIDATION_FAILED', message, context });
  }
}

/** A task file that was explicitly asked for does not exist */
export class NotFoundError extends TaskdeckError {
  public readonly path: string;

  constructor(path: string, cause?: unknown) {
    super({ code: 'FILE_NOT_FOUND', message: `No such file: ${path}`, context: { path }, cause });
    this.path = path;
  }
}

/** File content is not valid JSON */
export class ParseError extends TaskdeckError {
  constructor(message: string, context?: ErrorContext, cause?: unknown) {
    super({ code: 'PARSE_FAILED', message, context, cause });
  }
}

/** File parsed but does not have the expected shape */
export class SchemaError extends TaskdeckError {
  constructor(message: string, context?: ErrorContext) {
    super({ code: 'SCHEMA_INVALID', message, context });
  }
}

export class TaskIndexError extends TaskdeckError {
  constructor(index: number, size: number) {
    super({
      code: 'INDEX_OUT_OF_RANGE',
      message: `Task index ${index} out of range (size ${size})`,
      context: { index, size },
    });
  }
}

export function isTaskdeckError(value: unknown): value is TaskdeckError {
  return value instanceof TaskdeckError;
}

export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
