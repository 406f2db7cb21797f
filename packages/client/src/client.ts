/**
 * Task API Client
 *
 * Thin REST wrapper around the task resource. Every method validates its
 * input before sending, parses the response against the wire schema, and
 * rejects with a TaskApiError subclass.
 *
 * @example
 * ```typescript
 * import { TaskClient } from '@tasksync/client';
 *
 * const client = new TaskClient({ baseUrl: 'http://localhost:8000/api' });
 * const plan = await client.planTask('Summarize this PDF');
 * const subtasks = await client.getTasks({ parentId: plan.id });
 * ```
 */

import type { Logger } from 'pino';
import { resolveClientOptions, type ResolvedClientOptions } from './config.js';
import { NetworkError, NotFoundError, ServerError, ValidationError, toError } from './errors.js';
import { describeIssues, parseEnvelope, taskListSchema, taskSchema } from './schema.js';
import { assertProgress, assertStatus, assertTaskId, validateTaskUpdate } from './task.js';
import type {
  CreateTaskPayload,
  PlanTaskPayload,
  Task,
  TaskApi,
  TaskClientOptions,
  TaskFilters,
  UpdateTaskPayload,
} from './types.js';

type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

interface ApiResponse {
  status: number;
  body: unknown;
}

/**
 * Pull a human-readable message out of an error body. FastAPI-style
 * `detail`, then `error`, then `message`; falls back to the raw text.
 */
function extractMessage(text: string): string | undefined {
  if (!text) return undefined;
  try {
    const parsed: unknown = JSON.parse(text);
    if (parsed && typeof parsed === 'object') {
      for (const field of ['detail', 'error', 'message']) {
        const value: unknown = Reflect.get(parsed, field);
        if (typeof value === 'string') return value;
        if (value !== undefined && value !== null) return JSON.stringify(value);
      }
    }
  } catch {
    // Not JSON; use the text as-is
  }
  return text.slice(0, 200);
}

export class TaskClient implements TaskApi {
  private readonly options: ResolvedClientOptions;

  constructor(options: TaskClientOptions = {}) {
    this.options = resolveClientOptions(options);
  }

  get baseUrl(): string {
    return this.options.baseUrl;
  }

  get logger(): Logger {
    return this.options.logger;
  }

  // ============ Operations ============

  /**
   * Ask the backend to plan a task from a natural-language description.
   * Subtasks may still be generating when this resolves.
   */
  async planTask(description: string, context?: Record<string, unknown>): Promise<Task> {
    if (!description.trim()) {
      throw new ValidationError('Task description is required', 'description');
    }
    const payload: PlanTaskPayload = context ? { description, context } : { description };
    const res = await this.request('POST', '/tasks/plan', payload);
    return this.parseTask(res, 'POST /tasks/plan');
  }

  /**
   * Create a task
   */
  async createTask(payload: CreateTaskPayload): Promise<Task> {
    if (!payload.name.trim()) {
      throw new ValidationError('Task name is required', 'name');
    }
    assertProgress(payload.progress);
    assertStatus(payload.status);
    const res = await this.request('POST', '/tasks', payload);
    return this.parseTask(res, 'POST /tasks');
  }

  /**
   * List tasks; filters are applied server-side
   */
  async getTasks(filters: TaskFilters = {}): Promise<Task[]> {
    const params = new URLSearchParams();
    if (filters.parentId) params.append('parent_id', filters.parentId);
    if (filters.status) params.append('status', filters.status);
    const query = params.toString();
    const path = query ? `/tasks?${query}` : '/tasks';

    const res = await this.request('GET', path);
    const parsed = taskListSchema.safeParse(res.body);
    if (!parsed.success) {
      throw new ServerError(`Malformed task list from GET ${path}: ${describeIssues(parsed.error)}`, res.status);
    }
    return parsed.data.tasks;
  }

  /**
   * Get a single task
   */
  async getTask(id: string): Promise<Task> {
    assertTaskId(id);
    const path = `/tasks/${encodeURIComponent(id)}`;
    const res = await this.request('GET', path);
    return this.parseTask(res, `GET ${path}`);
  }

  /**
   * Partially update a task. Only the fields present in `updates` are sent.
   */
  async updateTask(id: string, updates: UpdateTaskPayload): Promise<Task> {
    assertTaskId(id);
    validateTaskUpdate(updates);
    const path = `/tasks/${encodeURIComponent(id)}`;
    const res = await this.request('PUT', path, updates);
    return this.parseTask(res, `PUT ${path}`);
  }

  /**
   * Delete a task. Deleting an unknown id rejects with NotFoundError.
   */
  async deleteTask(id: string): Promise<void> {
    assertTaskId(id);
    await this.request('DELETE', `/tasks/${encodeURIComponent(id)}`);
  }

  // ============ Transport ============

  private async request(method: HttpMethod, path: string, body?: unknown): Promise<ApiResponse> {
    const { baseUrl, headers, timeoutMs, logger } = this.options;
    const requestHeaders: Record<string, string> = { Accept: 'application/json', ...headers };
    if (body !== undefined) {
      requestHeaders['Content-Type'] = 'application/json';
    }

    logger.debug({ method, path }, 'Task API request');

    let res: Response;
    try {
      res = await this.options.fetch(`${baseUrl}${path}`, {
        method,
        headers: requestHeaders,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err) {
      const error = toError(err);
      logger.warn({ method, path, err: error }, 'Task API unreachable');
      throw new NetworkError(`${method} ${path} failed: ${error.message}`, { cause: err });
    }

    let text: string;
    try {
      text = await res.text();
    } catch (err) {
      const error = toError(err);
      logger.warn({ method, path, status: res.status, err: error }, 'Task API body unreadable');
      // An error status still maps by code when its body is lost
      if (res.ok) {
        throw new NetworkError(`${method} ${path} failed while reading the body: ${error.message}`, { cause: err });
      }
      text = '';
    }

    if (!res.ok) {
      const message = extractMessage(text) ?? res.statusText;
      logger.warn({ method, path, status: res.status }, 'Task API error: %s', message);
      if (res.status === 404) {
        throw new NotFoundError(`${method} ${path}: ${message || 'not found'}`);
      }
      throw new ServerError(`Tasks API ${res.status}: ${message}`, res.status);
    }

    if (!text) {
      return { status: res.status, body: undefined };
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      throw new ServerError(`Malformed JSON from ${method} ${path}`, res.status);
    }

    const envelope = parseEnvelope(json);
    if (envelope) {
      if (!envelope.success) {
        const message = typeof envelope.error === 'string' ? envelope.error : 'request unsuccessful';
        throw new ServerError(`${method} ${path}: ${message}`, res.status);
      }
      return { status: res.status, body: envelope.data };
    }
    return { status: res.status, body: json };
  }

  private parseTask(res: ApiResponse, label: string): Task {
    const parsed = taskSchema.safeParse(res.body);
    if (!parsed.success) {
      throw new ServerError(`Malformed task from ${label}: ${describeIssues(parsed.error)}`, res.status);
    }
    return parsed.data;
  }
}

export default TaskClient;
