import { z } from 'zod';
import type { LogLevel } from '@logtape/logtape';
import { getDefaultDbPath } from '@quadrant/core';

const LOG_LEVELS = ['debug', 'info', 'warning', 'error', 'fatal'] as const satisfies readonly LogLevel[];

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform(v => v === 'true' || v === '1');

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  HOST: z.string().min(1).default('127.0.0.1'),
  QUADRANT_DB_PATH: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  QUADRANT_SEED: booleanFlag,
  QUADRANT_URGENT_WINDOW_DAYS: z.coerce.number().int().min(0).default(3),
});

export interface ServerConfig {
  port: number;
  host: string;
  dbPath: string;
  logLevel: LogLevel;
  /** Insert the sample tasks when the database is empty */
  seed: boolean;
  urgentWindowDays: number;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/** Validate and default the server's environment variables */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    host: e.HOST,
    dbPath: e.QUADRANT_DB_PATH ?? getDefaultDbPath(env),
    logLevel: e.LOG_LEVEL,
    seed: e.QUADRANT_SEED,
    urgentWindowDays: e.QUADRANT_URGENT_WINDOW_DAYS,
  };
}
