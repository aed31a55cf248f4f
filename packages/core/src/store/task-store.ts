/**
 * The task store: the only owner of task records.
 *
 * Every method validates its input, runs as one SQLite transaction and hands
 * back fresh TaskView objects. Failures are thrown as ValidationError or
 * NotFoundError for the caller (HTTP layer, CLI) to translate.
 */

import { getLogger } from '@logtape/logtape';
import type { QuadrantDb } from '../db.js';
import { getRawDb } from '../db.js';
import type {
  NewTaskInput, QuadrantGroup, Task, TaskId, TaskStats, TaskStatusFilter,
  TaskUpdate, TaskView, TimingStats,
} from '../types/task.js';
import type { Quadrant } from '../types/quadrant.js';
import { QUADRANT_ORDER, QuadrantName } from '../types/quadrant.js';
import { NotFoundError, ValidationError } from '../errors.js';
import {
  countTasks, deleteTaskPermanently, getAllTasks, getTaskById, insertTask, updateTask,
} from '../queries/task-queries.js';
import type { TaskRowPatch } from '../queries/task-queries.js';
import {
  DEFAULT_URGENT_WINDOW_DAYS, MIN_SEARCH_LENGTH,
  isWithinUrgencyWindow, matchesQuery, normalizeDeadline, normalizeDescription,
  normalizeTitle, requireBoolean, toTaskView,
} from '../queries/task-helpers.js';

const logger = getLogger(['quadrant', 'store']);

export interface TaskStoreOptions {
  /** Days before a deadline within which a task without an explicit urgency is urgent */
  urgentWindowDays?: number;
  /** Clock override for tests */
  now?: () => Date;
}

export interface ListOptions {
  quadrant?: Quadrant;
  status?: TaskStatusFilter;
  /** Group by quadrant in the order Do now, Schedule, Delegate, Eliminate */
  grouped?: boolean;
}

export class TaskStore {
  private readonly urgentWindowDays: number;
  private readonly now: () => Date;

  constructor(
    private readonly db: QuadrantDb,
    options: TaskStoreOptions = {},
  ) {
    this.urgentWindowDays = options.urgentWindowDays ?? DEFAULT_URGENT_WINDOW_DAYS;
    this.now = options.now ?? (() => new Date());
  }

  create(input: NewTaskInput): TaskView {
    const title = normalizeTitle(input.title);
    const important = requireBoolean(input.important, 'important');
    const deadlineAt = normalizeDeadline(input.deadlineAt);
    const now = this.now();

    const urgent = input.urgent != null
      ? requireBoolean(input.urgent, 'urgent')
      : deadlineAt != null && isWithinUrgencyWindow(deadlineAt, now, this.urgentWindowDays);

    const task = this.transaction(() => insertTask(this.db, {
      title,
      description: normalizeDescription(input.description),
      urgent,
      important,
      done: false,
      deadlineAt,
      createdAt: now.toISOString(),
      completedAt: null,
    }));

    logger.debug('Created task {id}', { id: task.id });
    return toTaskView(task, now);
  }

  get(id: TaskId): TaskView {
    return toTaskView(this.require(id), this.now());
  }

  /**
   * Lazy, restartable sequence of tasks. Nothing is read until iteration
   * starts, and every new iteration reads the table again.
   */
  list(options: ListOptions = {}): Iterable<TaskView> {
    return {
      [Symbol.iterator]: () => this.iterate(options),
    };
  }

  update(id: TaskId, fields: TaskUpdate): TaskView {
    const now = this.now();
    const task = this.transaction(() => {
      const current = this.require(id);
      const patch: TaskRowPatch = {};

      if (fields.title !== undefined) patch.title = normalizeTitle(fields.title);
      if (fields.description !== undefined) patch.description = normalizeDescription(fields.description);
      if (fields.important !== undefined) patch.important = requireBoolean(fields.important, 'important');
      if (fields.deadlineAt !== undefined) patch.deadlineAt = normalizeDeadline(fields.deadlineAt);

      if (fields.urgent !== undefined) patch.urgent = requireBoolean(fields.urgent, 'urgent');

      if (fields.done !== undefined) {
        Object.assign(patch, completionPatch(current, requireBoolean(fields.done, 'done'), now));
      }

      return this.apply(id, patch);
    });

    logger.debug('Updated task {id}', { id });
    return toTaskView(task, now);
  }

  delete(id: TaskId): void {
    this.transaction(() => {
      if (!deleteTaskPermanently(this.db, id)) throw new NotFoundError(id);
    });
    logger.debug('Deleted task {id}', { id });
  }

  markDone(id: TaskId): TaskView {
    return this.setDone(id, true);
  }

  reopen(id: TaskId): TaskView {
    return this.setDone(id, false);
  }

  search(query: string): TaskView[] {
    const q = query.trim();
    if (q.length < MIN_SEARCH_LENGTH) {
      throw new ValidationError(
        `Search query must be at least ${MIN_SEARCH_LENGTH} characters`,
        'query',
      );
    }
    const now = this.now();
    // In JS rather than LIKE: SQLite only folds ASCII case
    return getAllTasks(this.db)
      .filter(t => matchesQuery(t, q))
      .map(t => toTaskView(t, now));
  }

  /** All tasks split into the four quadrants, in emission order */
  matrix(): QuadrantGroup[] {
    const all = Array.from(this.list());
    return QUADRANT_ORDER.map(quadrant => ({
      quadrant,
      label: QuadrantName[quadrant],
      tasks: all.filter(t => t.quadrant === quadrant),
    }));
  }

  stats(): TaskStats {
    const byQuadrant: Record<Quadrant, number> = { Q1: 0, Q2: 0, Q3: 0, Q4: 0 };
    const byStatus = { completed: 0, pending: 0 };
    let total = 0;

    for (const task of this.list()) {
      total++;
      byQuadrant[task.quadrant]++;
      if (task.done) byStatus.completed++;
      else byStatus.pending++;
    }

    return { total, byQuadrant, byStatus };
  }

  /** On-time/late accounting over tasks that have a deadline */
  timingStats(): TimingStats {
    const now = this.now().getTime();
    const stats = { completedOnTime: 0, completedLate: 0, onPlanPending: 0, overtimePending: 0 };

    for (const task of getAllTasks(this.db)) {
      if (!task.deadlineAt) continue;
      const deadline = new Date(task.deadlineAt).getTime();

      if (task.done) {
        const completed = task.completedAt ? new Date(task.completedAt).getTime() : now;
        if (completed <= deadline) stats.completedOnTime++;
        else stats.completedLate++;
      } else if (now <= deadline) {
        stats.onPlanPending++;
      } else {
        stats.overtimePending++;
      }
    }

    return stats;
  }

  count(): number {
    return countTasks(this.db);
  }

  // -------------------------------------------------------------------------

  private *iterate(options: ListOptions): Iterator<TaskView> {
    const now = this.now();
    const done = options.status == null ? undefined : options.status === 'completed';
    let views = getAllTasks(this.db, { done }).map(t => toTaskView(t, now));

    if (options.quadrant) {
      const wanted = options.quadrant;
      views = views.filter(v => v.quadrant === wanted);
    }

    if (options.grouped) {
      for (const quadrant of QUADRANT_ORDER) {
        for (const view of views) {
          if (view.quadrant === quadrant) yield view;
        }
      }
      return;
    }

    yield* views;
  }

  private setDone(id: TaskId, done: boolean): TaskView {
    const now = this.now();
    const task = this.transaction(() => {
      const current = this.require(id);
      return this.apply(id, completionPatch(current, done, now));
    });
    logger.debug('Set task {id} done={done}', { id, done });
    return toTaskView(task, now);
  }

  private require(id: TaskId): Task {
    const task = getTaskById(this.db, id);
    if (!task) throw new NotFoundError(id);
    return task;
  }

  private apply(id: TaskId, patch: TaskRowPatch): Task {
    const task = updateTask(this.db, id, patch);
    if (!task) throw new NotFoundError(id);
    return task;
  }

  private transaction<T>(fn: () => T): T {
    return getRawDb(this.db).transaction(fn)();
  }
}

/** Completion bookkeeping: completedAt is stamped once and cleared on reopen */
function completionPatch(current: Task, done: boolean, now: Date): TaskRowPatch {
  if (done) {
    return { done: true, completedAt: current.done ? current.completedAt : now.toISOString() };
  }
  return { done: false, completedAt: null };
}
