import { Command } from 'commander';
import type { TaskStore } from '@quadrant/core';
import * as out from '../output.js';
import { $try, parseTaskId } from '../helpers.js';

export function createGetCommand(store: TaskStore): Command {
  return new Command('get')
    .description('Show a task in detail')
    .argument('<taskId>', 'The id of the task')
    .option('--json', 'Print the task as JSON')
    .action((taskId: string, opts: { json?: boolean }) => { $try(() => {
      const task = store.get(parseTaskId(taskId));
      if (opts.json) {
        console.log(JSON.stringify(task, null, 2));
        return;
      }
      out.printTaskDetails(task);
    }); });
}
