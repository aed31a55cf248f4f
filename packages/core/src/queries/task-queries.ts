/**
 * Row-level task operations using Drizzle ORM.
 * These know nothing about validation or derived fields; see TaskStore for that.
 */

import { asc, count, eq } from 'drizzle-orm';
import type { QuadrantDb } from '../db.js';
import type { Task, TaskId } from '../types/task.js';
import { tasks } from '../schema/tasks.js';

export type TaskRow = typeof tasks.$inferSelect;
export type NewTaskRow = Omit<typeof tasks.$inferInsert, 'id'>;
export type TaskRowPatch = Partial<Omit<TaskRow, 'id' | 'createdAt'>>;

/** Map a Drizzle row to a Task object */
function toTask(row: TaskRow): Task {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    urgent: row.urgent,
    important: row.important,
    done: row.done,
    deadlineAt: row.deadlineAt,
    createdAt: row.createdAt,
    completedAt: row.completedAt,
  };
}

// ---------------------------------------------------------------------------
// Read queries
// ---------------------------------------------------------------------------

/** Get a single task by ID */
export function getTaskById(db: QuadrantDb, taskId: TaskId): Task | null {
  const row = db.select().from(tasks).where(eq(tasks.id, taskId)).get();
  return row ? toTask(row) : null;
}

/** Get all tasks in insertion order, optionally filtered by completion */
export function getAllTasks(db: QuadrantDb, opts?: { done?: boolean }): Task[] {
  const query = db.select().from(tasks);
  const rows = opts?.done != null
    ? query.where(eq(tasks.done, opts.done)).orderBy(asc(tasks.id)).all()
    : query.orderBy(asc(tasks.id)).all();
  return rows.map(toTask);
}

export function countTasks(db: QuadrantDb): number {
  const row = db.select({ n: count() }).from(tasks).get();
  return row?.n ?? 0;
}

// ---------------------------------------------------------------------------
// Write operations
// ---------------------------------------------------------------------------

/** Insert a task and return it with its assigned id */
export function insertTask(db: QuadrantDb, values: NewTaskRow): Task {
  const row = db.insert(tasks).values(values).returning().get();
  return toTask(row);
}

/** Apply a partial update; returns the updated task or null if there is no such row */
export function updateTask(db: QuadrantDb, taskId: TaskId, patch: TaskRowPatch): Task | null {
  if (Object.keys(patch).length === 0) return getTaskById(db, taskId);
  const row = db.update(tasks).set(patch).where(eq(tasks.id, taskId)).returning().get();
  return row ? toTask(row) : null;
}

/** Delete a task permanently; returns whether a row was removed */
export function deleteTaskPermanently(db: QuadrantDb, taskId: TaskId): boolean {
  const result = db.delete(tasks).where(eq(tasks.id, taskId)).run();
  return result.changes > 0;
}
