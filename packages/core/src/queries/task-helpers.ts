import type { Task, TaskView } from '../types/task.js';
import { classify } from '../types/quadrant.js';
import { ValidationError } from '../errors.js';

const DAY_MS = 86_400_000;

/** Default number of days before a deadline in which an unflagged task counts as urgent */
export const DEFAULT_URGENT_WINDOW_DAYS = 3;

/** Minimum length of a trimmed search query */
export const MIN_SEARCH_LENGTH = 2;

/** Trimmed title, or ValidationError when nothing is left */
export function normalizeTitle(title: unknown): string {
  if (typeof title !== 'string') {
    throw new ValidationError('Title must be a string', 'title');
  }
  const trimmed = title.trim();
  if (trimmed.length === 0) {
    throw new ValidationError('Title must not be empty', 'title');
  }
  return trimmed;
}

/** Blank descriptions are stored as null */
export function normalizeDescription(description: string | null | undefined): string | null {
  const trimmed = description?.trim();
  return trimmed ? trimmed : null;
}

/** Canonical ISO timestamp for a deadline, or ValidationError for anything Date can't read */
export function normalizeDeadline(deadline: string | null | undefined): string | null {
  if (deadline == null || deadline.trim() === '') return null;
  const d = new Date(deadline);
  if (isNaN(d.getTime())) {
    throw new ValidationError(`Invalid deadline: ${deadline}`, 'deadlineAt');
  }
  return d.toISOString();
}

export function requireBoolean(value: unknown, field: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ValidationError(`${field} must be a boolean`, field);
  }
  return value;
}

/** True when the deadline has passed or falls within the next `windowDays` days */
export function isWithinUrgencyWindow(deadlineAt: string, now: Date, windowDays: number): boolean {
  return new Date(deadlineAt).getTime() - now.getTime() <= windowDays * DAY_MS;
}

/** Whole days left until the deadline (negative once it has passed) */
export function daysUntil(deadlineAt: string, now: Date): number {
  return Math.floor((new Date(deadlineAt).getTime() - now.getTime()) / DAY_MS);
}

function pluralDays(n: number): string {
  return n === 1 ? '1 day' : `${n} days`;
}

/** Deadline-relative status text, null for tasks without a deadline */
export function deadlineStatus(task: Task, now: Date): string | null {
  if (!task.deadlineAt) return null;

  if (task.done) {
    const completed = task.completedAt ? new Date(task.completedAt) : now;
    return completed.getTime() <= new Date(task.deadlineAt).getTime()
      ? 'Completed on time'
      : 'Completed late';
  }

  if (new Date(task.deadlineAt).getTime() < now.getTime()) return 'Overdue';
  const days = daysUntil(task.deadlineAt, now);
  if (days === 0) return 'Due within a day';
  return `${pluralDays(days)} left`;
}

/** Attach the derived fields. Always returns a new object. */
export function toTaskView(task: Task, now: Date): TaskView {
  return {
    ...task,
    quadrant: classify(task.urgent, task.important),
    daysUntilDeadline: task.deadlineAt && !task.done ? daysUntil(task.deadlineAt, now) : null,
    statusMessage: deadlineStatus(task, now),
  };
}

/** Case-insensitive substring match on title or description */
export function matchesQuery(task: Task, query: string): boolean {
  const q = query.toLowerCase();
  return task.title.toLowerCase().includes(q)
    || (task.description != null && task.description.toLowerCase().includes(q));
}
