/**
 * Request shapes. These only check types and reject unknown keys; content
 * rules (non-empty title, readable deadline) are enforced by the store.
 */

import { z } from 'zod';

export const CreateTaskBody = z.object({
  title: z.string(),
  description: z.string().nullable().optional(),
  urgent: z.boolean().optional(),
  important: z.boolean(),
  deadlineAt: z.string().nullable().optional(),
}).strict();

export const UpdateTaskBody = z.object({
  title: z.string().optional(),
  description: z.string().nullable().optional(),
  urgent: z.boolean().optional(),
  important: z.boolean().optional(),
  deadlineAt: z.string().nullable().optional(),
  done: z.boolean().optional(),
}).strict();

export const ListTasksQuery = z.object({
  quadrant: z.string().optional(),
  status: z.string().optional(),
  grouped: z.enum(['true', 'false', '1', '0']).optional(),
});

export type CreateTaskBody = z.infer<typeof CreateTaskBody>;
export type UpdateTaskBody = z.infer<typeof UpdateTaskBody>;
