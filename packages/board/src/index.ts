/**
 * @tasksync/board - cache and sync layer for agent tasks
 *
 * @example
 * ```tsx
 * import { TaskClient } from '@tasksync/client';
 * import { TaskSync, TaskSyncProvider, useTask, useSubtaskProgress } from '@tasksync/board';
 *
 * const sync = new TaskSync({ client: new TaskClient(), pollIntervalMs: 3000 });
 *
 * function TaskProgress({ taskId }: { taskId?: string }) {
 *   const { data: task, error } = useTask(taskId);
 *   const { completedFraction } = useSubtaskProgress(task?.id);
 *   // render task, error and completedFraction
 * }
 *
 * <TaskSyncProvider sync={sync}><TaskProgress taskId="t1" /></TaskSyncProvider>;
 * ```
 *
 * @packageDocumentation
 */

// Sync layer
export {
  TaskSync,
  DEFAULT_POLL_INTERVAL_MS,
  type TaskSyncOptions,
  type TaskSyncEvents,
  type MutationName,
  type WatchOptions,
  type WatchTaskOptions,
  type UpdateOptions,
  type DeleteOptions,
  type Subscription,
} from './sync.js';

// Cache
export {
  TaskCache,
  QueryStore,
  type CacheEntry,
  type EntryStatus,
  type EntryListener,
  type FetchOptions,
  type QueryState,
} from './store.js';
export { taskKeys, filterSignature, hashKey, type DetailKey, type ListKey } from './keys.js';
export { Poller, type PollerOptions } from './poller.js';

// Derived state
export { completedFraction, summarizeSubtasks, type SubtaskSummary } from './progress.js';

// React bindings
export { TaskSyncProvider, useTaskSync } from './context.js';
export {
  useTask,
  useTasks,
  useSubtasks,
  useSubtaskProgress,
  useTaskMutations,
  toQueryResult,
  type QueryResult,
} from './hooks.js';
