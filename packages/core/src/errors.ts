import type { TaskId } from './types/task.js';

/** Base class for errors raised by the task store */
export class StoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Caller supplied invalid input (empty title, bad deadline, short search query) */
export class ValidationError extends StoreError {
  constructor(message: string, readonly field?: string) {
    super(message);
  }
}

export class NotFoundError extends StoreError {
  constructor(readonly taskId: TaskId) {
    super(`Task ${taskId} not found`);
  }
}
