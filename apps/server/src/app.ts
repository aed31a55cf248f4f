import cors from 'cors';
import express from 'express';
import type { Express } from 'express';
import type { TaskStore } from '@quadrant/core';
import { createTasksRouter } from './routes/tasks.js';
import { requestLogger } from './request-logger.js';
import { errorHandler, HttpError } from './errors.js';

export const APP_INFO = {
  title: 'Eisenhower To-Do API',
  version: '1.0.0',
  description: 'Task management organized by the Eisenhower matrix',
} as const;

/** Build the express app around an already constructed store */
export function createApp(store: TaskStore): Express {
  const app = express();
  app.use(cors());
  app.use(express.json());
  app.use(requestLogger());

  app.get('/', (_req, res) => {
    res.json(APP_INFO);
  });

  app.use('/tasks', createTasksRouter(store));

  app.use((req, _res, next) => {
    next(new HttpError(404, `No route for ${req.method} ${req.path}`));
  });
  app.use(errorHandler());

  return app;
}

