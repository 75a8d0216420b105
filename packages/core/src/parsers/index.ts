export {
  parseDate,
  formatDate,
  addDays,
  todayString,
  validateDateFormat,
  convertToDate,
  requireDate,
  isTaskOverdue,
} from './date-parser.js';
export { parsePriority, validatePriority, normalizePriority } from './priority-parser.js';
export { parseStatus, statusFromRecord } from './status-parser.js';
