import { Command } from 'commander';
import type { TaskStore } from '@quadrant/core';
import * as out from '../output.js';
import { $try, parseQuadrantArg, parseStatusFlags } from '../helpers.js';

interface ListOptions {
  quadrant?: string;
  done?: boolean;
  pending?: boolean;
  matrix?: boolean;
}

export function createListCommand(store: TaskStore): Command {
  return new Command('list')
    .alias('ls')
    .description('List tasks')
    .option('-q, --quadrant <quadrant>', 'Only one quadrant (Q1-Q4, do-now, schedule, delegate, eliminate)')
    .option('--done', 'Only completed tasks')
    .option('--pending', 'Only pending tasks')
    .option('-m, --matrix', 'Group tasks by quadrant')
    .action((opts: ListOptions) => { $try(() => {
      if (opts.matrix) {
        if (opts.quadrant || opts.done || opts.pending) {
          throw new Error('--matrix cannot be combined with filters');
        }
        out.printMatrix(store.matrix());
        return;
      }

      const quadrant = opts.quadrant !== undefined ? parseQuadrantArg(opts.quadrant) : undefined;
      const status = parseStatusFlags(opts);
      out.printTasks(store.list({ quadrant, status, grouped: true }), 'No tasks.');
    }); });
}
