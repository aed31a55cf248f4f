import { Command } from 'commander';
import type { TaskStore } from '@quadrant/core';

import { createAddCommand } from './commands/add.js';
import { createListCommand } from './commands/list.js';
import { createGetCommand } from './commands/get.js';
import { createEditCommand } from './commands/edit.js';
import { createCheckCommand, createUncheckCommand } from './commands/check.js';
import { createDeleteCommand } from './commands/delete.js';
import { createSearchCommand } from './commands/search.js';
import { createStatsCommand } from './commands/stats.js';
import { createInitCommand } from './commands/init.js';

export function createProgram(store: TaskStore, dbPath: string): Command {
  const program = new Command()
    .name('quadrant')
    .description('Eisenhower-matrix task manager')
    .version('1.0.0');

  program.addCommand(createAddCommand(store));
  program.addCommand(createListCommand(store));
  program.addCommand(createGetCommand(store));
  program.addCommand(createEditCommand(store));
  program.addCommand(createCheckCommand(store));
  program.addCommand(createUncheckCommand(store));
  program.addCommand(createDeleteCommand(store));
  program.addCommand(createSearchCommand(store));
  program.addCommand(createStatsCommand(store));
  program.addCommand(createInitCommand(store, dbPath));

  return program;
}
