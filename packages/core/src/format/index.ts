export { formatTaskDisplay, formatTaskList, getShortId } from './task-display.js';
export type { DisplayOptions } from './task-display.js';
export { generateTaskReport } from './task-report.js';
export type { TaskReport, ReportFilter } from './task-report.js';
