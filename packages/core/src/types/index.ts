export { Quadrant, QuadrantName, QUADRANT_ORDER, classify, quadrantFlags, parseQuadrant, isQuadrant } from './quadrant.js';
export type {
  TaskId, TaskStatusFilter, Task, TaskView, NewTaskInput, TaskUpdate,
  QuadrantGroup, TaskStats, TimingStats,
} from './task.js';
