import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';

export const tasks = sqliteTable('tasks', {
  /** AUTOINCREMENT so ids of deleted tasks are never handed out again */
  id: integer('id').primaryKey({ autoIncrement: true }),
  title: text('title').notNull(),
  description: text('description'),
  urgent: integer('urgent', { mode: 'boolean' }).notNull(),
  important: integer('important', { mode: 'boolean' }).notNull(),
  done: integer('done', { mode: 'boolean' }).notNull().default(false),
  deadlineAt: text('deadline_at'),
  createdAt: text('created_at').notNull(),
  /** Frozen at completion time for on-time/late accounting */
  completedAt: text('completed_at'),
}, (table) => [
  index('idx_tasks_quadrant').on(table.urgent, table.important),
  index('idx_tasks_done').on(table.done),
]);
