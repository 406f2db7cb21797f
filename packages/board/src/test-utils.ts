import {
  NotFoundError,
  type CreateTaskPayload,
  type Task,
  type TaskApi,
  type TaskFilters,
  type UpdateTaskPayload,
} from '@tasksync/client';
import pino from 'pino';
import { vi } from 'vitest';

export const silentLogger = pino({ enabled: false });

export function makeTask(overrides: Partial<Task> = {}): Task {
  return {
    id: 't1',
    name: 'Task',
    status: 'pending',
    progress: 0,
    startTime: 1700000000,
    subtasks: [],
    dependencies: [],
    assignedTools: [],
    artifacts: [],
    metadata: {},
    ...overrides,
  };
}

export function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: Error) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** In-memory task backend behind the TaskApi interface */
export class FakeTaskApi implements TaskApi {
  readonly tasks = new Map<string, Task>();
  private nextId = 1;

  planTask = vi.fn(async (description: string, _context?: Record<string, unknown>) =>
    this.insert({ name: description, status: 'pending_planning' })
  );

  createTask = vi.fn(async (payload: CreateTaskPayload) => this.insert(payload));

  getTasks = vi.fn(async (filters: TaskFilters = {}) =>
    [...this.tasks.values()]
      .filter((t) => !filters.parentId || t.parentId === filters.parentId)
      .filter((t) => !filters.status || t.status === filters.status)
      .map((t) => ({ ...t }))
  );

  getTask = vi.fn(async (id: string) => ({ ...this.require(id) }));

  updateTask = vi.fn(async (id: string, updates: UpdateTaskPayload) => {
    const task = { ...this.require(id), ...updates };
    this.tasks.set(id, task);
    return { ...task };
  });

  deleteTask = vi.fn(async (id: string) => {
    this.require(id);
    this.tasks.delete(id);
    for (const task of this.tasks.values()) {
      if (task.parentId === id) task.parentId = null;
    }
  });

  seed(overrides: Partial<Task>): Task {
    const task = makeTask(overrides);
    this.tasks.set(task.id, task);
    return task;
  }

  private insert(payload: CreateTaskPayload): Task {
    const task = makeTask({
      id: `t${this.nextId++}`,
      name: payload.name,
      status: payload.status ?? 'pending',
      progress: payload.progress ?? 0,
      parentId: payload.parentId,
      dependencies: payload.dependencies ?? [],
      assignedTools: payload.assignedTools ?? [],
      metadata: payload.metadata ?? {},
    });
    this.tasks.set(task.id, task);
    const parent = payload.parentId ? this.tasks.get(payload.parentId) : undefined;
    if (parent) parent.subtasks = [...parent.subtasks, task.id];
    return { ...task };
  }

  private require(id: string): Task {
    const task = this.tasks.get(id);
    if (!task) throw new NotFoundError(`GET /tasks/${id}: Task not found`);
    return task;
  }
}
