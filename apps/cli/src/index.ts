#!/usr/bin/env node

import { createDb, closeDb, getDefaultDbPath, TaskStore } from '@quadrant/core';
import { createProgram } from './program.js';

const dbPath = getDefaultDbPath();
const db = createDb(dbPath);
const store = new TaskStore(db);

const program = createProgram(store, dbPath);

try {
  program.parse();
} finally {
  closeDb(db);
}
