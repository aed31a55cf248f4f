import { Command } from 'commander';
import type { TaskStore } from '@quadrant/core';
import * as out from '../output.js';
import { $try, parseTaskId } from '../helpers.js';

export function createCheckCommand(store: TaskStore): Command {
  return new Command('check')
    .description('Mark one or more tasks done')
    .argument('<taskIds...>', 'The id(s) of the task(s) to check')
    .action((taskIds: string[]) => {
      for (const raw of taskIds) {
        $try(() => {
          const task = store.markDone(parseTaskId(raw));
          out.success(`Checked ${task.id}: ${task.title}`);
        });
      }
    });
}

export function createUncheckCommand(store: TaskStore): Command {
  return new Command('uncheck')
    .description('Reopen one or more tasks')
    .argument('<taskIds...>', 'The id(s) of the task(s) to uncheck')
    .action((taskIds: string[]) => {
      for (const raw of taskIds) {
        $try(() => {
          const task = store.reopen(parseTaskId(raw));
          out.success(`Unchecked ${task.id}: ${task.title}`);
        });
      }
    });
}
