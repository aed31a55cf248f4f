import { configure, getConsoleSink, getLogger } from '@logtape/logtape';
import type { LogLevel, Logger } from '@logtape/logtape';

/** Console logging for everything under the "quadrant" category */
export async function configureLogger(level: LogLevel): Promise<Logger> {
  await configure({
    sinks: { console: getConsoleSink() },
    filters: {},
    loggers: [
      {
        category: ['quadrant'],
        lowestLevel: level,
        sinks: ['console'],
      },
      {
        category: ['logtape', 'meta'],
        lowestLevel: 'warning',
        sinks: ['console'],
      },
    ],
  });

  const logger = getLogger(['quadrant', 'server']);
  logger.debug`Logger configured`;
  return logger;
}
