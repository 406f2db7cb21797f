/**
 * Status transitions an agent reports while it works on a task.
 * Each call is a single partial update through the wrapped API.
 */

import type { Logger } from 'pino';
import { ValidationError } from './errors.js';
import { assertProgress } from './task.js';
import type { Task, TaskApi, TaskStatus, UpdateTaskPayload } from './types.js';

export class TaskLifecycle {
  constructor(
    private readonly api: TaskApi,
    private readonly logger?: Logger
  ) {}

  async updateProgress(id: string, progress: number, status?: TaskStatus): Promise<Task> {
    assertProgress(progress);
    const updates: UpdateTaskPayload = { progress };
    if (status) {
      updates.status = status;
    }
    return this.apply(id, updates);
  }

  async complete(id: string, result?: unknown): Promise<Task> {
    const updates: UpdateTaskPayload = { status: 'completed', progress: 1 };
    if (result !== undefined) {
      updates.result = result;
    }
    return this.apply(id, updates);
  }

  async fail(id: string, message: string): Promise<Task> {
    if (!message.trim()) {
      throw new ValidationError('Failure message is required', 'error');
    }
    return this.apply(id, { status: 'failed', error: message });
  }

  async pause(id: string): Promise<Task> {
    return this.apply(id, { status: 'paused' });
  }

  async resume(id: string): Promise<Task> {
    return this.apply(id, { status: 'running' });
  }

  private async apply(id: string, updates: UpdateTaskPayload): Promise<Task> {
    const task = await this.api.updateTask(id, updates);
    this.logger?.info({ taskId: id, status: task.status, progress: task.progress }, 'Task transitioned');
    return task;
  }
}
