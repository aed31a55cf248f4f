export { TaskStore } from './task-store.js';
export type { TaskStoreOptions, ListOptions } from './task-store.js';
export { seedSampleTasks, SAMPLE_TASKS } from './sample-tasks.js';
