/**
 * Task sync layer
 *
 * Keeps a TaskCache in step with the task API: reads go through the cache,
 * watches poll it, and every mutation writes or invalidates the entries it
 * affects as soon as the server confirms.
 *
 * @example
 * ```typescript
 * import { TaskClient } from '@tasksync/client';
 * import { TaskSync } from '@tasksync/board';
 *
 * const sync = new TaskSync({ client: new TaskClient() });
 * const plan = await sync.planTask('Summarize this PDF');
 *
 * const watch = sync.watchTask(plan.id, {
 *   onChange: (entry) => console.log(entry?.data?.status, entry?.data?.progress),
 * });
 * // later
 * watch.unsubscribe();
 * ```
 */

import { EventEmitter } from 'events';
import {
  NotFoundError,
  assertProgress,
  checkTaskInvariants,
  createLogger,
  isTerminalStatus,
  toError,
  validateTaskUpdate,
  type CreateTaskPayload,
  type Task,
  type TaskApi,
  type TaskFilters,
  type UpdateTaskPayload,
} from '@tasksync/client';
import type { Logger } from 'pino';
import { hashKey, taskKeys } from './keys.js';
import { Poller } from './poller.js';
import { summarizeSubtasks, type SubtaskSummary } from './progress.js';
import { TaskCache, type CacheEntry, type FetchOptions } from './store.js';

export const DEFAULT_POLL_INTERVAL_MS = 5000;

// ============ Type-safe EventEmitter ============

export type MutationName = 'planTask' | 'createTask' | 'updateTask' | 'deleteTask';

export interface TaskSyncEvents {
  'task:planned': [task: Task];
  'task:created': [task: Task];
  'task:updated': [task: Task];
  'task:deleted': [id: string];
  'mutation:failed': [operation: MutationName, error: Error];
  'poll:failed': [key: string, error: Error];
}

type EventKey = keyof TaskSyncEvents;

class TypedEventEmitter extends EventEmitter {
  override emit<K extends EventKey>(event: K, ...args: TaskSyncEvents[K]): boolean {
    return super.emit(event, ...args);
  }

  override on<K extends EventKey>(event: K, listener: (...args: TaskSyncEvents[K]) => void): this {
    return super.on(event, listener);
  }

  override once<K extends EventKey>(event: K, listener: (...args: TaskSyncEvents[K]) => void): this {
    return super.once(event, listener);
  }

  override off<K extends EventKey>(event: K, listener: (...args: TaskSyncEvents[K]) => void): this {
    return super.off(event, listener);
  }
}

// ============ Options ============

export interface TaskSyncOptions {
  client: TaskApi;
  /** Defaults to a new, empty cache */
  cache?: TaskCache;
  logger?: Logger;
  /** Detail polling interval when a watch does not set one (default: 5000) */
  pollIntervalMs?: number;
  /** Stop polling a task once it reaches a terminal status (default: true) */
  stopWhenSettled?: boolean;
}

export interface WatchOptions<T> {
  /** Polling interval in ms, or false to disable polling */
  refetchInterval?: number | false;
  onChange?: (entry: CacheEntry<T> | undefined) => void;
}

export interface WatchTaskOptions extends WatchOptions<Task> {
  stopWhenSettled?: boolean;
}

export interface UpdateOptions {
  /** Apply the update to the cache before the server answers */
  optimistic?: boolean;
}

export interface DeleteOptions {
  /** Parent whose subtask list should refresh after the delete */
  parentId?: string;
}

/** Handle returned by every watch; call unsubscribe once on teardown */
export interface Subscription {
  readonly active: boolean;
  unsubscribe(): void;
}

function createSubscription(teardown: () => void, logger: Logger): Subscription {
  let active = true;
  return {
    get active() {
      return active;
    },
    unsubscribe() {
      if (!active) {
        logger.warn('Subscription already cancelled');
        return;
      }
      active = false;
      teardown();
    },
  };
}

// ============ TaskSync ============

export class TaskSync extends TypedEventEmitter {
  readonly cache: TaskCache;
  readonly pollIntervalMs: number;

  private readonly client: TaskApi;
  private readonly logger: Logger;
  private readonly stopWhenSettled: boolean;

  constructor(options: TaskSyncOptions) {
    super();
    this.client = options.client;
    this.logger = options.logger ?? createLogger('tasksync:sync');
    this.cache = options.cache ?? new TaskCache(this.logger);
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.stopWhenSettled = options.stopWhenSettled ?? true;
  }

  // ============ Queries ============

  async fetchTask(id: string, options?: FetchOptions): Promise<Task> {
    return this.cache.details.fetch(taskKeys.detail(id), () => this.loadTask(id), options);
  }

  async fetchTasks(filters?: TaskFilters, options?: FetchOptions): Promise<Task[]> {
    return this.cache.lists.fetch(taskKeys.list(filters), () => this.client.getTasks(filters), options);
  }

  async fetchSubtasks(parentId: string, options?: FetchOptions): Promise<Task[]> {
    return this.fetchTasks({ parentId }, options);
  }

  /**
   * Keep `detail(id)` fresh while subscribed. No id means no request and no
   * timer. Polling pauses while the task is terminal (unless
   * stopWhenSettled is false) and resumes if it becomes active again.
   * It ends for good once the task is deleted or the server answers 404.
   */
  watchTask(id: string | undefined, options: WatchTaskOptions = {}): Subscription {
    if (!id) {
      return createSubscription(() => undefined, this.logger);
    }

    const key = taskKeys.detail(id);
    const release = this.cache.details.observe(key, () => this.loadTask(id));
    const interval = options.refetchInterval ?? this.pollIntervalMs;
    const stopWhenSettled = options.stopWhenSettled ?? this.stopWhenSettled;

    let gone = false;
    const markGone = () => {
      gone = true;
      poller?.stop();
    };

    const poller =
      interval === false
        ? null
        : new Poller(() => this.fetchTask(id, { force: true }), {
            intervalMs: interval,
            logger: this.logger,
            onError: (error) => {
              if (error instanceof NotFoundError) markGone();
              this.emit('poll:failed', hashKey(key), error);
            },
          });

    const onDeleted = (deletedId: string) => {
      if (deletedId === id) markGone();
    };
    this.on('task:deleted', onDeleted);

    const onEntry = (entry: CacheEntry<Task> | undefined) => {
      if (poller && !gone) {
        const task = entry?.data;
        if (stopWhenSettled && task && isTerminalStatus(task.status)) {
          poller.stop();
        } else {
          poller.start();
        }
      }
      options.onChange?.(entry);
    };
    const unsubscribeEntry = this.cache.details.subscribe(key, onEntry);
    onEntry(this.cache.details.get(key));

    this.fetchTask(id).catch((err: unknown) => {
      if (err instanceof NotFoundError) markGone();
      this.reportPollFailure(hashKey(key), err);
    });

    return createSubscription(() => {
      poller?.stop();
      this.off('task:deleted', onDeleted);
      unsubscribeEntry();
      release();
    }, this.logger);
  }

  /** Keep `list(filters)` fresh while subscribed. Lists do not poll unless asked to. */
  watchTasks(filters: TaskFilters | undefined, options: WatchOptions<Task[]> = {}): Subscription {
    const key = taskKeys.list(filters);
    const release = this.cache.lists.observe(key, () => this.client.getTasks(filters));

    const interval = options.refetchInterval ?? false;
    const poller =
      interval === false
        ? null
        : new Poller(() => this.fetchTasks(filters, { force: true }), {
            intervalMs: interval,
            logger: this.logger,
            onError: (error) => this.emit('poll:failed', hashKey(key), error),
          });

    const onChange = options.onChange;
    const unsubscribeEntry = onChange ? this.cache.lists.subscribe(key, onChange) : () => undefined;

    this.fetchTasks(filters).catch((err: unknown) => this.reportPollFailure(hashKey(key), err));
    poller?.start();

    return createSubscription(() => {
      poller?.stop();
      unsubscribeEntry();
      release();
    }, this.logger);
  }

  watchSubtasks(parentId: string | undefined, options: WatchOptions<Task[]> = {}): Subscription {
    if (!parentId) {
      return createSubscription(() => undefined, this.logger);
    }
    return this.watchTasks({ parentId }, options);
  }

  /**
   * Recompute the subtask summary from the live `list({parentId})` entry
   * on every change to it.
   */
  watchSubtaskProgress(
    parentId: string,
    listener: (summary: SubtaskSummary) => void,
    options: Omit<WatchOptions<Task[]>, 'onChange'> = {}
  ): Subscription {
    let last = this.cache.lists.getData(taskKeys.list({ parentId }));
    if (last) {
      listener(summarizeSubtasks(last));
    }
    return this.watchSubtasks(parentId, {
      ...options,
      onChange: (entry) => {
        // Status-only transitions (stale, loading) keep the same list
        if (entry?.data && entry.data !== last) {
          last = entry.data;
          listener(summarizeSubtasks(entry.data));
        }
      },
    });
  }

  // ============ Mutations ============

  /**
   * Plan a task. Only the synthesized parent is cached; its subtasks arrive
   * with the next fetch of its subtask list.
   */
  async planTask(description: string, context?: Record<string, unknown>): Promise<Task> {
    let task: Task;
    try {
      task = await this.client.planTask(description, context);
    } catch (err) {
      throw this.mutationFailed('planTask', err);
    }
    this.applyCreated(task);
    this.logger.info({ taskId: task.id }, 'Task planned: %s', task.name);
    this.emit('task:planned', task);
    return task;
  }

  async createTask(payload: CreateTaskPayload): Promise<Task> {
    let task: Task;
    try {
      task = await this.client.createTask(payload);
    } catch (err) {
      throw this.mutationFailed('createTask', err);
    }
    this.applyCreated(task);
    this.logger.info({ taskId: task.id }, 'Task created: %s', task.name);
    this.emit('task:created', task);
    return task;
  }

  /**
   * Update a task and overwrite `detail(id)` with the server's copy.
   * With `optimistic`, the cached task changes first and is rolled back if
   * the request fails. A rollback only replaces the optimistic value; if
   * newer data landed meanwhile, the entry is invalidated instead.
   */
  async updateTask(id: string, updates: UpdateTaskPayload, options: UpdateOptions = {}): Promise<Task> {
    validateTaskUpdate(updates);
    const key = taskKeys.detail(id);

    const snapshot = options.optimistic ? this.cache.details.snapshot(key) : undefined;
    const optimistic = snapshot?.data ? { ...snapshot.data, ...updates } : undefined;
    if (optimistic) {
      this.cache.details.setData(key, optimistic);
    }

    let task: Task;
    try {
      task = await this.client.updateTask(id, updates);
    } catch (err) {
      if (optimistic) {
        if (this.cache.details.getData(key) === optimistic) {
          this.cache.details.restore(key, snapshot);
        } else {
          this.cache.details.invalidate(key);
        }
      }
      throw this.mutationFailed('updateTask', err);
    }

    this.checkInvariants(task);
    this.cache.details.setData(key, task);
    // Every list, list({parentId}) included
    this.cache.lists.invalidateAll();
    this.logger.info({ taskId: id, status: task.status, progress: task.progress }, 'Task updated');
    this.emit('task:updated', task);
    return task;
  }

  /** Shorthand for an optimistic progress update */
  async setProgress(id: string, progress: number): Promise<Task> {
    assertProgress(progress);
    return this.updateTask(id, { progress }, { optimistic: true });
  }

  /**
   * Delete a task and drop `detail(id)`. The API returns nothing, so the
   * parent's detail is refreshed only when the parent is known: passed in,
   * or read from the cached task before the delete.
   */
  async deleteTask(id: string, options: DeleteOptions = {}): Promise<void> {
    const key = taskKeys.detail(id);
    const parentId = options.parentId ?? this.cache.details.getData(key)?.parentId ?? undefined;

    try {
      await this.client.deleteTask(id);
    } catch (err) {
      throw this.mutationFailed('deleteTask', err);
    }

    this.cache.details.remove(key);
    this.cache.lists.invalidateAll();
    if (parentId) {
      this.cache.details.invalidate(taskKeys.detail(parentId));
    }
    this.logger.info({ taskId: id }, 'Task deleted');
    this.emit('task:deleted', id);
  }

  // ============ Helpers ============

  private async loadTask(id: string): Promise<Task> {
    const task = await this.client.getTask(id);
    this.checkInvariants(task);
    return task;
  }

  private applyCreated(task: Task): void {
    this.cache.lists.invalidateAll();
    if (task.parentId) {
      this.cache.details.invalidate(taskKeys.detail(task.parentId));
    }
    this.checkInvariants(task);
    this.cache.details.setData(taskKeys.detail(task.id), task);
  }

  private checkInvariants(task: Task): void {
    const violations = checkTaskInvariants(task);
    if (violations.length > 0) {
      this.logger.warn({ taskId: task.id, violations }, 'Server returned a task that breaks task invariants');
    }
  }

  private mutationFailed(operation: MutationName, err: unknown): Error {
    const error = toError(err);
    this.logger.error({ operation, err: error }, 'Task mutation failed');
    this.emit('mutation:failed', operation, error);
    return error;
  }

  private reportPollFailure(key: string, err: unknown): void {
    const error = toError(err);
    this.logger.warn({ key, err: error }, 'Task fetch failed');
    this.emit('poll:failed', key, error);
  }
}
