import { Command } from 'commander';
import type { TaskStore } from '@quadrant/core';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createSearchCommand(store: TaskStore): Command {
  return new Command('search')
    .description('Find tasks whose title or description contains the query')
    .argument('<query>', 'At least two characters')
    .action((query: string) => { $try(() => {
      out.printTasks(store.search(query), `No tasks match '${query}'.`);
    }); });
}
