// Task helpers
export {
  DEFAULT_URGENT_WINDOW_DAYS,
  MIN_SEARCH_LENGTH,
  normalizeTitle,
  normalizeDescription,
  normalizeDeadline,
  isWithinUrgencyWindow,
  daysUntil,
  deadlineStatus,
  toTaskView,
  matchesQuery,
} from './task-helpers.js';

// Task queries
export {
  getTaskById,
  getAllTasks,
  countTasks,
  insertTask,
  updateTask,
  deleteTaskPermanently,
} from './task-queries.js';
export type { TaskRow, NewTaskRow, TaskRowPatch } from './task-queries.js';
