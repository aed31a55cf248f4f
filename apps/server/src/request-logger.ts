import type { RequestHandler } from 'express';
import { getLogger } from '@logtape/logtape';

const logger = getLogger(['quadrant', 'http']);

// request logging middleware
export const requestLogger = (): RequestHandler => (req, res, next) => {
  const started = performance.now();
  res.on('finish', () => {
    const ms = Math.round(performance.now() - started);
    logger.info('{method} {url} {status} {ms}ms', {
      method: req.method,
      url: req.originalUrl,
      status: res.statusCode,
      ms,
    });
  });
  next();
};
