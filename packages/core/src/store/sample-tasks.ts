import type { NewTaskInput } from '../types/task.js';
import type { TaskStore } from './task-store.js';

interface SampleTask extends NewTaskInput {
  done?: boolean;
}

/** One task per quadrant; the Eliminate one already done */
export const SAMPLE_TASKS: readonly SampleTask[] = [
  {
    title: 'Submit the API project',
    description: 'Finish the endpoints and write the documentation',
    urgent: true,
    important: true,
  },
  {
    title: 'Learn the ORM',
    description: 'Read the docs and try the examples',
    urgent: false,
    important: true,
  },
  {
    title: 'Attend the lecture',
    urgent: true,
    important: false,
  },
  {
    title: 'Watch the new season',
    description: 'New season of a favourite show',
    urgent: false,
    important: false,
    done: true,
  },
];

/**
 * Seed the sample tasks into an empty store.
 * Returns the number of tasks added (0 when the store already has tasks).
 */
export function seedSampleTasks(store: TaskStore): number {
  if (store.count() > 0) return 0;

  for (const { done, ...input } of SAMPLE_TASKS) {
    const task = store.create(input);
    if (done) store.markDone(task.id);
  }
  return SAMPLE_TASKS.length;
}
