import { Command } from 'commander';
import type { TaskStore } from '@quadrant/core';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createStatsCommand(store: TaskStore): Command {
  return new Command('stats')
    .description('Show task counts per quadrant and deadline outcomes')
    .option('--json', 'Print the numbers as JSON')
    .action((opts: { json?: boolean }) => { $try(() => {
      const stats = store.stats();
      const timing = store.timingStats();
      if (opts.json) {
        console.log(JSON.stringify({ ...stats, timing }, null, 2));
        return;
      }
      out.printStats(stats, timing);
    }); });
}
