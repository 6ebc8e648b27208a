import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { http, HttpResponse } from 'msw';
import type { Task } from '@taskpad/shared';
import { TaskService, filterTasks } from './tasks';
import { ApiClient } from '../lib/api';
import { AuthSession } from '../lib/auth-session';
import { MemoryStorage } from '../lib/session-store';
import { ApiError, AuthenticationError, MalformedResponseError, ValidationError } from '../utils/errors';
import { server } from '../test/mocks/server';
import { TEST_API_URL, mockTasks } from '../test/mocks/handlers';

const [firstTask, secondTask] = mockTasks;

describe('filterTasks', () => {
  const tasks: Task[] = mockTasks;

  it('keeps everything for "all"', () => {
    expect(filterTasks(tasks, 'all')).toEqual(tasks);
  });

  it('keeps open tasks for "active"', () => {
    expect(filterTasks(tasks, 'active').map((t) => t.id)).toEqual([firstTask?.id]);
  });

  it('keeps finished tasks for "completed"', () => {
    expect(filterTasks(tasks, 'completed').map((t) => t.id)).toEqual([secondTask?.id]);
  });

  it('rejects an unknown filter', () => {
    expect(() => filterTasks(tasks, 'archived')).toThrow(new ValidationError('Unknown task filter: archived'));
  });
});

describe('TaskService', () => {
  let api: ApiClient;
  let session: AuthSession;
  let tasks: TaskService;

  beforeEach(async () => {
    api = new ApiClient(TEST_API_URL);
    session = new AuthSession({ apiClient: api, storage: new MemoryStorage(), visibility: null });
    tasks = new TaskService(api, session);
    await session.login('alice123', 'password123');
  });

  afterEach(() => {
    session.destroy();
  });

  it('lists the signed-in user\'s tasks', async () => {
    await expect(tasks.listTasks()).resolves.toEqual(mockTasks);
  });

  it('fetches a single task', async () => {
    await expect(tasks.getTask('b3f1c2a4-0000-4000-8000-000000000002')).resolves.toEqual(secondTask);
  });

  it('reports a missing task with the server message', async () => {
    const error = await tasks.getTask('nope').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ status: 404, message: 'Task with id nope not found' });
  });

  it('creates a task from trimmed input', async () => {
    const post = vi.spyOn(api, 'post');

    const task = await tasks.createTask({ title: '  Buy milk  ' });

    expect(post).toHaveBeenCalledWith('/tasks', { title: 'Buy milk', description: null, completed: false });
    expect(task).toEqual({
      id: 'b3f1c2a4-0000-4000-8000-000000000003',
      title: 'Buy milk',
      description: null,
      completed: false,
      created_at: 1760000300,
      updated_at: 1760000300,
    });
  });

  it('rejects a blank title without a request', async () => {
    const post = vi.spyOn(api, 'post');

    await expect(tasks.createTask({ title: '   ' })).rejects.toThrow(
      new ValidationError('Task title is required')
    );
    expect(post).not.toHaveBeenCalled();
  });

  it('updates a task', async () => {
    const task = await tasks.updateTask('b3f1c2a4-0000-4000-8000-000000000001', { completed: true });

    expect(task).toEqual({ ...firstTask, completed: true, updated_at: 1760000400 });
  });

  it('trims an updated description and clears a blank one', async () => {
    const put = vi.spyOn(api, 'put');
    const id = 'b3f1c2a4-0000-4000-8000-000000000001';

    await tasks.updateTask(id, { description: '   ' });
    const updated = await tasks.updateTask(id, { description: '  notes  ' });

    expect(put.mock.calls.map(([, body]) => body)).toEqual([{ description: null }, { description: 'notes' }]);
    expect(updated.description).toBe('notes');
  });

  it('leaves the description out of an update that does not mention it', async () => {
    const put = vi.spyOn(api, 'put');

    await tasks.updateTask('b3f1c2a4-0000-4000-8000-000000000001', { title: ' Renamed ' });

    expect(put).toHaveBeenCalledWith('/tasks/b3f1c2a4-0000-4000-8000-000000000001', { title: 'Renamed' });
  });

  it('rejects an empty update', async () => {
    await expect(tasks.updateTask('b3f1c2a4-0000-4000-8000-000000000001', {})).rejects.toThrow(
      'Nothing to update'
    );
  });

  it('deletes a task', async () => {
    await expect(tasks.deleteTask('b3f1c2a4-0000-4000-8000-000000000001')).resolves.toBeUndefined();
  });

  it('rejects a response that is not a task list', async () => {
    server.use(http.get(`${TEST_API_URL}/tasks`, () => HttpResponse.json([{ id: 1 }])));

    await expect(tasks.listTasks()).rejects.toThrow(new MalformedResponseError('Malformed task response'));
  });

  it('refuses to call the Resource API when signed out', async () => {
    const get = vi.spyOn(api, 'get');
    session.logout();

    await expect(tasks.listTasks()).rejects.toThrow(new AuthenticationError('Please log in first'));
    expect(get).not.toHaveBeenCalled();
  });
});
