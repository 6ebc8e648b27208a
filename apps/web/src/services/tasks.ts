/**
 * Task Service
 * Resource API client for the signed-in user's tasks
 */

import {
  createTaskSchema,
  taskListSchema,
  taskFilterSchema,
  taskSchema,
  updateTaskSchema,
  type CreateTaskInput,
  type Task,
  type UpdateTaskInput,
} from '@taskpad/shared';
import type { z } from 'zod';
import type { ApiClient } from '../lib/api';
import type { AuthSession } from '../lib/auth-session';
import { AuthenticationError, MalformedResponseError, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';

const taskLogger = logger.child('tasks');

function parseTaskResponse<T extends z.ZodTypeAny>(schema: T, data: unknown): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new MalformedResponseError('Malformed task response');
  }
  return result.data;
}

/** `filter` usually comes from the UI as a plain string; unknown values are rejected. */
export function filterTasks(tasks: Task[], filter: string): Task[] {
  const parsed = taskFilterSchema.safeParse(filter);
  if (!parsed.success) {
    throw new ValidationError(`Unknown task filter: ${filter}`);
  }

  switch (parsed.data) {
    case 'active':
      return tasks.filter((task) => !task.completed);
    case 'completed':
      return tasks.filter((task) => task.completed);
    case 'all':
      return tasks;
  }
}

export class TaskService {
  constructor(
    private readonly api: ApiClient,
    private readonly session: AuthSession,
  ) {}

  async listTasks(): Promise<Task[]> {
    this.requireSession();
    const data = await this.api.get('/tasks');
    const tasks = parseTaskResponse(taskListSchema, data);
    taskLogger.debug('Fetched tasks', { count: tasks.length });
    return tasks;
  }

  async getTask(id: string): Promise<Task> {
    this.requireSession();
    const data = await this.api.get(`/tasks/${encodeURIComponent(id)}`);
    return parseTaskResponse(taskSchema, data);
  }

  async createTask(input: CreateTaskInput): Promise<Task> {
    this.requireSession();

    const payload = createTaskSchema.safeParse(input);
    if (!payload.success) {
      throw new ValidationError(payload.error.issues[0]?.message ?? 'Invalid task');
    }

    const data = await this.api.post('/tasks', payload.data);
    const task = parseTaskResponse(taskSchema, data);
    taskLogger.info('Task created', { id: task.id });
    return task;
  }

  async updateTask(id: string, input: UpdateTaskInput): Promise<Task> {
    this.requireSession();

    const payload = updateTaskSchema.safeParse(input);
    if (!payload.success) {
      throw new ValidationError(payload.error.issues[0]?.message ?? 'Invalid task update');
    }

    const data = await this.api.put(`/tasks/${encodeURIComponent(id)}`, payload.data);
    return parseTaskResponse(taskSchema, data);
  }

  async deleteTask(id: string): Promise<void> {
    this.requireSession();
    await this.api.delete(`/tasks/${encodeURIComponent(id)}`);
    taskLogger.info('Task deleted', { id });
  }

  private requireSession(): void {
    if (!this.session.isAuthenticated()) {
      throw new AuthenticationError('Please log in first');
    }
  }
}
