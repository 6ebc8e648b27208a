import { z } from 'zod';

export const taskSchema = z.object({
  id: z.string(),
  title: z.string(),
  description: z.string().nullish(),
  completed: z.boolean(),
  created_at: z.number(),
  updated_at: z.number(),
});

export const taskListSchema = z.array(taskSchema);

export const createTaskSchema = z.object({
  title: z.string().trim().min(1, 'Task title is required'),
  description: z
    .string()
    .nullish()
    .transform((value) => (value ? value.trim() : null)),
  completed: z.unknown().transform(Boolean),
});

export const updateTaskSchema = z
  .object({
    title: z.string().trim().min(1, 'Task title is required').optional(),
    // undefined leaves the description unchanged; blank clears it
    description: z
      .string()
      .nullable()
      .optional()
      .transform((value) => (value === undefined || value === null ? value : value.trim() || null)),
    completed: z.boolean().optional(),
  })
  .refine((data) => Object.values(data).some((value) => value !== undefined), {
    message: 'Nothing to update',
  });

export const taskFilterSchema = z.enum(['all', 'active', 'completed']);

export type Task = z.infer<typeof taskSchema>;
export type CreateTaskInput = z.input<typeof createTaskSchema>;
export type CreateTaskPayload = z.infer<typeof createTaskSchema>;
export type UpdateTaskInput = z.input<typeof updateTaskSchema>;
export type UpdateTaskPayload = z.infer<typeof updateTaskSchema>;
export type TaskFilter = z.infer<typeof taskFilterSchema>;
