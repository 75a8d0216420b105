export { readTaskFile, writeTaskFile, readTextFile, ensureParentDir, TaskFileSchema } from './task-file.js';
export type { TaskFile } from './task-file.js';
export { parseCsv, parseCsvRecords, stringifyCsv, escapeCsvField } from './csv.js';
