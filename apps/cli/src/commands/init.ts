import { Command } from 'commander';
import type { TaskStore } from '@quadrant/core';
import { seedSampleTasks } from '@quadrant/core';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createInitCommand(store: TaskStore, dbPath: string): Command {
  return new Command('init')
    .description('Create the database, optionally with sample tasks')
    .option('--sample', 'Add one sample task per quadrant to an empty database')
    .action((opts: { sample?: boolean }) => { $try(() => {
      out.info(`Database: ${dbPath}`);
      if (!opts.sample) return;

      const added = seedSampleTasks(store);
      if (added === 0) {
        out.warning('Database already has tasks; samples not added.');
      } else {
        out.success(`Added ${added} sample tasks.`);
      }
    }); });
}
