export type LogLevel = 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  message: string;
}

export interface Logger {
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

const MAX_ENTRIES = 200;

function toMessage(args: unknown[]): string {
  return args
    .map((a) => (typeof a === 'string' ? a : a instanceof Error ? a.message : JSON.stringify(a)))
    .join(' ');
}

/**
 * In-memory logger. Keeps the last 200 entries and fans each one out to
 * subscribers; it never writes to the console itself.
 */
export class LogBuffer implements Logger {
  private buffer: LogEntry[] = [];
  private listeners: Array<(entry: LogEntry) => void> = [];

  info(...args: unknown[]): void {
    this.push('info', args);
  }

  warn(...args: unknown[]): void {
    this.push('warn', args);
  }

  error(...args: unknown[]): void {
    this.push('error', args);
  }

  getHistory(): LogEntry[] {
    return [...this.buffer];
  }

  clear(): void {
    this.buffer.length = 0;
  }

  /** Subscribe to new entries. Returns the unsubscribe function. */
  onLog(callback: (entry: LogEntry) => void): () => void {
    this.listeners.push(callback);
    return () => {
      const idx = this.listeners.indexOf(callback);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  private push(level: LogLevel, args: unknown[]): void {
    const entry: LogEntry = { timestamp: Date.now(), level, message: toMessage(args) };
    this.buffer.push(entry);
    if (this.buffer.length > MAX_ENTRIES) this.buffer.shift();
    for (const cb of this.listeners) cb(entry);
  }
}
