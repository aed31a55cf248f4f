import { Command } from 'commander';
import type { TaskStore, TaskUpdate } from '@quadrant/core';
import { QuadrantName } from '@quadrant/core';
import * as out from '../output.js';
import { $try, parseDeadlineArg, parseTaskId } from '../helpers.js';

interface EditOptions {
  title?: string;
  description?: string | false;
  urgent?: boolean;
  important?: boolean;
  deadline?: string | false;
}

export function createEditCommand(store: TaskStore): Command {
  return new Command('edit')
    .description('Change fields of a task')
    .argument('<taskId>', 'The id of the task')
    .option('-t, --title <title>', 'New title')
    .option('-d, --description <text>', 'New description')
    .option('--no-description', 'Remove the description')
    .option('-u, --urgent', 'Mark urgent')
    .option('--no-urgent', 'Mark not urgent')
    .option('-i, --important', 'Mark important')
    .option('--no-important', 'Mark not important')
    .option('--deadline <date>', 'New deadline')
    .option('--no-deadline', 'Remove the deadline')
    .action((taskId: string, opts: EditOptions) => { $try(() => {
      const id = parseTaskId(taskId);
      const update: TaskUpdate = {};
      if (opts.title !== undefined) update.title = opts.title;
      if (opts.description !== undefined) update.description = opts.description === false ? null : opts.description;
      if (opts.urgent !== undefined) update.urgent = opts.urgent;
      if (opts.important !== undefined) update.important = opts.important;
      if (opts.deadline !== undefined) {
        update.deadlineAt = opts.deadline === false ? null : parseDeadlineArg(opts.deadline);
      }

      if (Object.keys(update).length === 0) {
        out.warning('Nothing to change.');
        return;
      }

      const task = store.update(id, update);
      out.success(`Updated task ${task.id} (${QuadrantName[task.quadrant]})`);
    }); });
}
