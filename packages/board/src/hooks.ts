import type { Task, TaskFilters } from '@tasksync/client';
import { useEffect, useMemo } from 'react';
import { useStore } from 'zustand';
import { useTaskSync } from './context.js';
import { taskKeys, type ListKey } from './keys.js';
import { summarizeSubtasks, type SubtaskSummary } from './progress.js';
import type { CacheEntry, EntryStatus } from './store.js';
import type { WatchTaskOptions } from './sync.js';

export interface QueryResult<T> {
  data: T | undefined;
  error: Error | undefined;
  /** "idle" when there is nothing to fetch (no id) */
  status: EntryStatus | 'idle';
  isFetching: boolean;
}

export function toQueryResult<T>(entry: CacheEntry<T> | undefined, enabled = true): QueryResult<T> {
  if (!entry) {
    return { data: undefined, error: undefined, status: enabled ? 'loading' : 'idle', isFetching: false };
  }
  return { data: entry.data, error: entry.error, status: entry.status, isFetching: entry.fetching };
}

// Placeholder keys for disabled queries; nothing is ever stored under them.
const DISABLED_DETAIL = taskKeys.detail('');
const DISABLED_LIST: ListKey = ['tasks', 'list', ''];

/** A single task, polled while mounted */
export function useTask(id: string | undefined, options: Omit<WatchTaskOptions, 'onChange'> = {}): QueryResult<Task> {
  const sync = useTaskSync();
  const selector = useMemo(() => sync.cache.details.selectEntry(id ? taskKeys.detail(id) : DISABLED_DETAIL), [sync, id]);
  const entry = useStore(sync.cache.details.store, selector);
  const { refetchInterval, stopWhenSettled } = options;

  useEffect(() => {
    const subscription = sync.watchTask(id, { refetchInterval, stopWhenSettled });
    return () => subscription.unsubscribe();
  }, [sync, id, refetchInterval, stopWhenSettled]);

  return useMemo(() => toQueryResult(id ? entry : undefined, Boolean(id)), [entry, id]);
}

export function useTasks(filters?: TaskFilters, refetchInterval?: number | false): QueryResult<Task[]> {
  const sync = useTaskSync();
  const parentId = filters?.parentId;
  const status = filters?.status;
  const selector = useMemo(
    () => sync.cache.lists.selectEntry(taskKeys.list({ parentId, status })),
    [sync, parentId, status]
  );
  const entry = useStore(sync.cache.lists.store, selector);

  useEffect(() => {
    const subscription = sync.watchTasks({ parentId, status }, { refetchInterval });
    return () => subscription.unsubscribe();
  }, [sync, parentId, status, refetchInterval]);

  return useMemo(() => toQueryResult(entry), [entry]);
}

export function useSubtasks(parentId: string | undefined, refetchInterval?: number | false): QueryResult<Task[]> {
  const sync = useTaskSync();
  const selector = useMemo(
    () => sync.cache.lists.selectEntry(parentId ? taskKeys.list({ parentId }) : DISABLED_LIST),
    [sync, parentId]
  );
  const entry = useStore(sync.cache.lists.store, selector);

  useEffect(() => {
    const subscription = sync.watchSubtasks(parentId, { refetchInterval });
    return () => subscription.unsubscribe();
  }, [sync, parentId, refetchInterval]);

  return useMemo(() => toQueryResult(parentId ? entry : undefined, Boolean(parentId)), [entry, parentId]);
}

/** Subtask counts and completion fraction, derived from the live subtask list */
export function useSubtaskProgress(parentId: string | undefined, refetchInterval?: number | false): SubtaskSummary {
  const { data } = useSubtasks(parentId, refetchInterval);
  return useMemo(() => summarizeSubtasks(data ?? []), [data]);
}

/** Mutations bound to the provided TaskSync */
export function useTaskMutations() {
  const sync = useTaskSync();
  return useMemo(
    () => ({
      planTask: sync.planTask.bind(sync),
      createTask: sync.createTask.bind(sync),
      updateTask: sync.updateTask.bind(sync),
      setProgress: sync.setProgress.bind(sync),
      deleteTask: sync.deleteTask.bind(sync),
    }),
    [sync]
  );
}
