/**
 * chalk-based output formatting.
 */

import chalk from 'chalk';
import { Quadrant, QuadrantName, QUADRANT_ORDER } from '@quadrant/core';
import type { QuadrantGroup, TaskStats, TaskView, TimingStats } from '@quadrant/core';

const QUADRANT_COLORS: Record<Quadrant, (s: string) => string> = {
  [Quadrant.DoNow]: chalk.red.bold,
  [Quadrant.Schedule]: chalk.blue,
  [Quadrant.Delegate]: chalk.yellow,
  [Quadrant.Eliminate]: chalk.gray,
};

// --- Formatting functions ---

export function formatCheckbox(done: boolean): string {
  return done ? chalk.green('[x]') : chalk.gray('[ ]');
}

export function formatQuadrant(quadrant: Quadrant): string {
  return QUADRANT_COLORS[quadrant](quadrant);
}

export function formatQuadrantHeading(quadrant: Quadrant): string {
  return QUADRANT_COLORS[quadrant](`${QuadrantName[quadrant]} (${quadrant})`);
}

export function formatDeadlineStatus(task: TaskView): string {
  if (!task.statusMessage) return '';
  if (task.statusMessage === 'Overdue') return chalk.red(`  ${task.statusMessage}`);
  if (task.statusMessage === 'Due within a day') return chalk.yellow(`  ${task.statusMessage}`);
  return chalk.dim(`  ${task.statusMessage}`);
}

export function formatTaskLine(task: TaskView): string {
  const id = chalk.bold(String(task.id).padStart(4));
  const title = task.done ? chalk.strikethrough.dim(task.title) : task.title;
  return `${id} ${formatCheckbox(task.done)} ${formatQuadrant(task.quadrant)} ${title}${formatDeadlineStatus(task)}`;
}

/** 2026-03-10T12:00:00.000Z -> 2026-03-10 12:00 */
export function formatTimestamp(iso: string): string {
  return iso.replace('T', ' ').slice(0, 16);
}

// --- Printers ---

export function printTasks(tasks: Iterable<TaskView>, emptyMessage: string): number {
  let n = 0;
  for (const task of tasks) {
    console.log(formatTaskLine(task));
    n++;
  }
  if (n === 0) info(emptyMessage);
  return n;
}

export function printMatrix(groups: readonly QuadrantGroup[]): void {
  for (const group of groups) {
    console.log(formatQuadrantHeading(group.quadrant));
    if (group.tasks.length === 0) {
      console.log(chalk.dim('     (empty)'));
    }
    for (const task of group.tasks) {
      console.log(formatTaskLine(task));
    }
    console.log();
  }
}

export function printTaskDetails(task: TaskView): void {
  console.log(`${chalk.bold('ID:')}          ${task.id}`);
  console.log(`${chalk.bold('Title:')}       ${task.title}`);
  console.log(`${chalk.bold('Quadrant:')}    ${formatQuadrantHeading(task.quadrant)}`);
  console.log(`${chalk.bold('Urgent:')}      ${task.urgent ? 'yes' : 'no'}`);
  console.log(`${chalk.bold('Important:')}   ${task.important ? 'yes' : 'no'}`);
  console.log(`${chalk.bold('Done:')}        ${formatCheckbox(task.done)}`);
  console.log(`${chalk.bold('Deadline:')}    ${task.deadlineAt ? formatTimestamp(task.deadlineAt) : '-'}${formatDeadlineStatus(task)}`);
  console.log(`${chalk.bold('Created:')}     ${formatTimestamp(task.createdAt)}`);
  if (task.completedAt) {
    console.log(`${chalk.bold('Completed:')}   ${formatTimestamp(task.completedAt)}`);
  }
  if (task.description) {
    console.log(chalk.bold('Description:'));
    console.log(task.description);
  }
}

export function printStats(stats: TaskStats, timing: TimingStats): void {
  console.log(`${chalk.bold('Total:')}     ${stats.total}`);
  console.log(`${chalk.bold('Pending:')}   ${stats.byStatus.pending}`);
  console.log(`${chalk.bold('Completed:')} ${stats.byStatus.completed}`);
  console.log();
  for (const quadrant of QUADRANT_ORDER) {
    console.log(`${formatQuadrantHeading(quadrant)}: ${stats.byQuadrant[quadrant]}`);
  }
  console.log();
  console.log(`${chalk.bold('Completed on time:')} ${timing.completedOnTime}`);
  console.log(`${chalk.bold('Completed late:')}    ${timing.completedLate}`);
  console.log(`${chalk.bold('Pending, on plan:')}  ${timing.onPlanPending}`);
  console.log(`${chalk.bold('Pending, overdue:')}  ${timing.overtimePending}`);
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}
