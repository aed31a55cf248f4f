import type { ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { getLogger } from '@logtape/logtape';
import { NotFoundError, ValidationError } from '@quadrant/core';

const logger = getLogger(['quadrant', 'server']);

/** An error that already knows its HTTP status */
export class HttpError extends Error {
  constructor(readonly status: number, message: string) {
    super(message);
    this.name = 'HttpError';
  }
}

export interface ErrorBody {
  detail: string;
}

function isMalformedJson(err: unknown): boolean {
  // body-parser tags its parse failures with type 'entity.parse.failed'
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

function zodMessage(err: ZodError): string {
  const issue = err.issues[0];
  if (!issue) return 'Invalid request';
  const where = issue.path.length > 0 ? issue.path.join('.') : 'body';
  return `${where}: ${issue.message}`;
}

/** Map an error to status and body */
export function toErrorResponse(err: unknown): { status: number; body: ErrorBody } {
  if (err instanceof HttpError) return { status: err.status, body: { detail: err.message } };
  if (err instanceof ValidationError) return { status: 400, body: { detail: err.message } };
  if (err instanceof NotFoundError) return { status: 404, body: { detail: err.message } };
  if (err instanceof ZodError) return { status: 400, body: { detail: zodMessage(err) } };
  if (isMalformedJson(err)) return { status: 400, body: { detail: 'Malformed JSON body' } };
  return { status: 500, body: { detail: 'Internal server error' } };
}

export const errorHandler = (): ErrorRequestHandler => (err: unknown, req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  const { status, body } = toErrorResponse(err);
  if (status >= 500) {
    logger.error('Unhandled error on {method} {url}: {error}', {
      method: req.method,
      url: req.originalUrl,
      error: err,
    });
  }
  res.status(status).json(body);
};
