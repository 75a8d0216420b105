/**
 * JSON task file: { "tasks": [ {task record}, ... ] }
 */

import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { NotFoundError, ParseError, SchemaError } from '../errors.js';
import type { TaskRecord } from '../types/task.js';
import type { RawTaskRecord } from '../task.js';

export const TaskFileSchema = z.object({
  tasks: z.array(z.record(z.string(), z.unknown())),
});

export type TaskFile = z.infer<typeof TaskFileSchema>;

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Read a file as UTF-8, mapping a missing file to NotFoundError */
export function readTextFile(path: string): string {
  try {
    return readFileSync(path, 'utf8');
  } catch (err: unknown) {
    if (isMissingFile(err)) throw new NotFoundError(path, err);
    throw err;
  }
}

/** Create the parent directory of a file if it does not exist */
export function ensureParentDir(path: string): void {
  const dir = dirname(path);
  if (dir) mkdirSync(dir, { recursive: true });
}

/**
 * Read and check a task file.
 * Throws NotFoundError, ParseError (not JSON) or SchemaError (no `tasks` array).
 */
export function readTaskFile(path: string): RawTaskRecord[] {
  const text = readTextFile(path);

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err: unknown) {
    throw new ParseError(`Invalid JSON in task file ${path}`, { path }, err);
  }

  const parsed = TaskFileSchema.safeParse(data);
  if (!parsed.success) {
    const hasTasksKey = typeof data === 'object' && data !== null && 'tasks' in data;
    const reason = hasTasksKey ? parsed.error.issues[0]?.message ?? 'invalid tasks' : "Missing 'tasks' key";
    throw new SchemaError(`Invalid task file: ${path}. ${reason}.`, { path });
  }
  return parsed.data.tasks;
}

export function writeTaskFile(path: string, records: readonly TaskRecord[]): void {
  ensureParentDir(path);
  writeFileSync(path, JSON.stringify({ tasks: records }, null, 4), 'utf8');
}
