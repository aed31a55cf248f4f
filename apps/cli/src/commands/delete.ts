import { Command } from 'commander';
import type { TaskStore } from '@quadrant/core';
import * as out from '../output.js';
import { $try, parseTaskId } from '../helpers.js';

export function createDeleteCommand(store: TaskStore): Command {
  return new Command('delete')
    .alias('rm')
    .description('Delete one or more tasks permanently')
    .argument('<taskIds...>', 'The id(s) of the task(s) to delete')
    .action((taskIds: string[]) => {
      for (const raw of taskIds) {
        $try(() => {
          const id = parseTaskId(raw);
          store.delete(id);
          out.success(`Deleted task ${id}`);
        });
      }
    });
}
