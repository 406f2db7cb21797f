/**
 * @tasksync/client - REST client for agent tasks
 *
 * @example
 * ```typescript
 * import { TaskClient, TaskLifecycle, isTerminalStatus } from '@tasksync/client';
 *
 * const client = new TaskClient();
 * const task = await client.createTask({ name: 'Index repository' });
 *
 * const lifecycle = new TaskLifecycle(client);
 * await lifecycle.updateProgress(task.id, 0.5, 'running');
 * const done = await lifecycle.complete(task.id, { files: 42 });
 * isTerminalStatus(done.status); // true
 * ```
 *
 * @packageDocumentation
 */

// Main client
export { TaskClient } from './client.js';
export { TaskLifecycle } from './lifecycle.js';

// Configuration and logging
export {
  resolveClientOptions,
  DEFAULT_API_URL,
  DEFAULT_TIMEOUT_MS,
  type ResolvedClientOptions,
} from './config.js';
export { createLogger, type Logger, type LoggerOptions } from './logger.js';

// Errors
export {
  TaskApiError,
  ValidationError,
  NotFoundError,
  ServerError,
  NetworkError,
  isTaskApiError,
  toError,
  type TaskApiErrorKind,
} from './errors.js';

// Wire schema
export { taskSchema, taskListSchema, taskStatusSchema, artifactSchema } from './schema.js';

// Task rules
export {
  isTaskStatus,
  isTerminalStatus,
  isValidProgress,
  isRunnable,
  checkTaskInvariants,
  assertProgress,
  validateTaskUpdate,
} from './task.js';

export { TASK_STATUSES, TERMINAL_STATUSES } from './types.js';
export type {
  Task,
  TaskStatus,
  Artifact,
  CreateTaskPayload,
  PlanTaskPayload,
  UpdateTaskPayload,
  TaskFilters,
  TaskClientOptions,
  TaskApi,
} from './types.js';

export { default } from './client.js';
