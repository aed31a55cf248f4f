import { Router } from 'express';
import type { Request } from 'express';
import { parseQuadrant } from '@quadrant/core';
import type { Quadrant, TaskId, TaskStatusFilter, TaskStore, TaskView } from '@quadrant/core';
import { HttpError } from '../errors.js';
import { CreateTaskBody, ListTasksQuery, UpdateTaskBody } from '../schemas.js';

const INVALID_QUADRANT = 'Invalid quadrant. Use: Q1, Q2, Q3, Q4';
const INVALID_STATUS = 'Invalid status. Use: completed or pending';

function parseTaskId(raw: string | undefined): TaskId {
  if (!raw || !/^\d+$/.test(raw)) throw new HttpError(400, 'Invalid task id');
  const id = Number(raw);
  if (!Number.isSafeInteger(id)) throw new HttpError(400, 'Invalid task id');
  return id;
}

function parseStatus(raw: string): TaskStatusFilter | null {
  return raw === 'completed' || raw === 'pending' ? raw : null;
}

function requireQuadrant(raw: string): Quadrant {
  const quadrant = parseQuadrant(raw);
  if (!quadrant) throw new HttpError(400, INVALID_QUADRANT);
  return quadrant;
}

function listing(tasks: TaskView[]) {
  return { count: tasks.length, tasks };
}

function idParam(req: Request<{ id: string }>): TaskId {
  return parseTaskId(req.params.id);
}

export function createTasksRouter(store: TaskStore): Router {
  const router = Router();

  router.get('/', (req, res) => {
    const query = ListTasksQuery.parse(req.query);

    let status: TaskStatusFilter | undefined;
    if (query.status !== undefined) {
      const parsed = parseStatus(query.status);
      if (!parsed) throw new HttpError(400, INVALID_STATUS);
      status = parsed;
    }

    const tasks = Array.from(store.list({
      quadrant: query.quadrant !== undefined ? requireQuadrant(query.quadrant) : undefined,
      status,
      grouped: query.grouped === 'true' || query.grouped === '1',
    }));
    res.json(listing(tasks));
  });

  router.get('/matrix', (_req, res) => {
    res.json({
      quadrants: store.matrix().map(group => ({
        quadrant: group.quadrant,
        label: group.label,
        count: group.tasks.length,
        tasks: group.tasks,
      })),
    });
  });

  router.get('/quadrant/:quadrant', (req, res) => {
    const quadrant = requireQuadrant(req.params.quadrant);
    res.json({ quadrant, ...listing(Array.from(store.list({ quadrant }))) });
  });

  router.get('/status/:status', (req, res) => {
    const status = parseStatus(req.params.status);
    if (!status) throw new HttpError(404, INVALID_STATUS);
    res.json({ status, ...listing(Array.from(store.list({ status }))) });
  });

  router.get('/search', (req, res) => {
    const q = typeof req.query['q'] === 'string' ? req.query['q'] : '';
    const tasks = store.search(q);
    if (tasks.length === 0) throw new HttpError(404, 'No tasks match the query');
    res.json({ query: q, ...listing(tasks) });
  });

  router.get('/stats', (_req, res) => {
    res.json(store.stats());
  });

  router.get('/stats/timing', (_req, res) => {
    res.json(store.timingStats());
  });

  router.get('/:id', (req, res) => {
    res.json(store.get(idParam(req)));
  });

  router.post('/', (req, res) => {
    const body = CreateTaskBody.parse(req.body);
    res.status(201).json(store.create(body));
  });

  router.patch('/:id', (req, res) => {
    const id = idParam(req);
    const body = UpdateTaskBody.parse(req.body);
    res.json(store.update(id, body));
  });

  router.post('/:id/complete', (req, res) => {
    res.json(store.markDone(idParam(req)));
  });

  router.post('/:id/reopen', (req, res) => {
    res.json(store.reopen(idParam(req)));
  });

  router.delete('/:id', (req, res) => {
    store.delete(idParam(req));
    res.status(204).end();
  });

  return router;
}
