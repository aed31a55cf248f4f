import type { Quadrant } from './quadrant.js';

export type TaskId = number;

export type TaskStatusFilter = 'completed' | 'pending';

export interface Task {
  readonly id: TaskId;
  readonly title: string;
  readonly description: string | null;
  readonly urgent: boolean;
  readonly important: boolean;
  readonly done: boolean;
  readonly deadlineAt: string | null; // ISO string
  readonly createdAt: string; // ISO string
  readonly completedAt: string | null; // ISO string
}

/** A task as handed out by the store, with the fields derived from it */
export interface TaskView extends Task {
  readonly quadrant: Quadrant;
  readonly daysUntilDeadline: number | null;
  readonly statusMessage: string | null;
}

export interface NewTaskInput {
  title: string;
  /** Derived from the deadline when omitted */
  urgent?: boolean;
  important: boolean;
  description?: string | null;
  deadlineAt?: string | null;
}

export interface TaskUpdate {
  title?: string;
  description?: string | null;
  urgent?: boolean;
  important?: boolean;
  deadlineAt?: string | null;
  done?: boolean;
}

export interface QuadrantGroup {
  readonly quadrant: Quadrant;
  readonly label: string;
  readonly tasks: readonly TaskView[];
}

export interface TaskStats {
  readonly total: number;
  readonly byQuadrant: Readonly<Record<Quadrant, number>>;
  readonly byStatus: { readonly completed: number; readonly pending: number };
}

export interface TimingStats {
  readonly completedOnTime: number;
  readonly completedLate: number;
  readonly onPlanPending: number;
  readonly overtimePending: number;
}
