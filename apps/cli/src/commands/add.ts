import { Command } from 'commander';
import type { TaskStore } from '@quadrant/core';
import { QuadrantName } from '@quadrant/core';
import * as out from '../output.js';
import { $try, parseDeadlineArg } from '../helpers.js';

interface AddOptions {
  urgent?: boolean;
  important?: boolean;
  description?: string;
  deadline?: string;
}

export function createAddCommand(store: TaskStore): Command {
  return new Command('add')
    .description('Add a task')
    .argument('<title>', 'Task title')
    .option('-u, --urgent', 'Mark the task urgent')
    .option('--no-urgent', 'Mark the task not urgent, even with a close deadline')
    .option('-i, --important', 'Mark the task important')
    .option('-d, --description <text>', 'Longer description')
    .option('--deadline <date>', 'Deadline (today, tomorrow, +3d, fri, 2026-03-01)')
    .action((title: string, opts: AddOptions) => { $try(() => {
      const task = store.create({
        title,
        urgent: opts.urgent,
        important: opts.important ?? false,
        description: opts.description,
        deadlineAt: opts.deadline !== undefined ? parseDeadlineArg(opts.deadline) : undefined,
      });
      out.success(`Added task ${task.id} to ${QuadrantName[task.quadrant]} (${task.quadrant})`);
    }); });
}
