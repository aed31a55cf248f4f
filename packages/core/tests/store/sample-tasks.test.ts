import { describe, it, expect } from 'vitest';
import { createTestDb } from '../../src/db.js';
import { TaskStore } from '../../src/store/task-store.js';
import { seedSampleTasks } from '../../src/store/sample-tasks.js';

describe('seedSampleTasks', () => {
  it('adds one task per quadrant to an empty store', () => {
    const store = new TaskStore(createTestDb());
    expect(seedSampleTasks(store)).toBe(4);
    expect(store.stats()).toEqual({
      total: 4,
      byQuadrant: { Q1: 1, Q2: 1, Q3: 1, Q4: 1 },
      byStatus: { completed: 1, pending: 3 },
    });
  });

  it('leaves a non-empty store alone', () => {
    const store = new TaskStore(createTestDb());
    store.create({ title: 'mine', urgent: false, important: false });
    expect(seedSampleTasks(store)).toBe(0);
    expect(store.count()).toBe(1);
  });
});
