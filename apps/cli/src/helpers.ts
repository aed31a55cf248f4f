import type { Quadrant, TaskId, TaskStatusFilter } from '@quadrant/core';
import { parseQuadrant, toDeadline } from '@quadrant/core';
import * as out from './output.js';

/** Parse a task id argument; only positive integers are accepted */
export function parseTaskId(raw: string): TaskId {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed) || Number(trimmed) === 0) {
    throw new Error(`Invalid task id: ${raw}`);
  }
  return Number(trimmed);
}

export function parseQuadrantArg(raw: string): Quadrant {
  const quadrant = parseQuadrant(raw);
  if (!quadrant) {
    throw new Error(`Unknown quadrant '${raw}'. Use Q1-Q4 or do-now, schedule, delegate, eliminate`);
  }
  return quadrant;
}

/** --done / --pending to a status filter */
export function parseStatusFlags(opts: { done?: boolean; pending?: boolean }): TaskStatusFilter | undefined {
  if (opts.done && opts.pending) {
    throw new Error('Cannot use both --done and --pending at the same time');
  }
  if (opts.done) return 'completed';
  if (opts.pending) return 'pending';
  return undefined;
}

/** "tomorrow", "+3d", "fri", "2026-03-01" or a full ISO timestamp */
export function parseDeadlineArg(raw: string, now?: Date): string {
  const deadline = toDeadline(raw, now);
  if (!deadline) throw new Error(`Could not understand deadline '${raw}'`);
  return deadline;
}

/**
 * Run a command body; errors are printed in red and set a non-zero
 * exit code. Returns false if the body threw.
 */
export function $try(fn: () => void): boolean {
  try {
    fn();
    return true;
  } catch (err: unknown) {
    out.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
    return false;
  }
}
