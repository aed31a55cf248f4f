// Types
export { Quadrant, QuadrantName, QUADRANT_ORDER, classify, quadrantFlags, parseQuadrant, isQuadrant } from './types/index.js';
export type {
  TaskId, TaskStatusFilter, Task, TaskView, NewTaskInput, TaskUpdate,
  QuadrantGroup, TaskStats, TimingStats,
} from './types/index.js';

// Errors
export { StoreError, ValidationError, NotFoundError } from './errors.js';

// Schema
export * from './schema/index.js';

// Database
export { createDb, createTestDb, closeDb, getDefaultDbPath, getDbPath, getRawDb } from './db.js';
export type { QuadrantDb } from './db.js';

// Parsers
export { parseDate, toDeadline } from './parsers/index.js';

// Queries
export * from './queries/index.js';

// Store
export { TaskStore, seedSampleTasks, SAMPLE_TASKS } from './store/index.js';
export type { TaskStoreOptions, ListOptions } from './store/index.js';
