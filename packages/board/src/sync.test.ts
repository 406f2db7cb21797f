import { NotFoundError, ServerError, ValidationError, type Task } from '@tasksync/client';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { hashKey, taskKeys } from './keys.js';
import { TaskSync } from './sync.js';
import { deferred, FakeTaskApi, silentLogger } from './test-utils.js';

describe('TaskSync', () => {
  let api: FakeTaskApi;
  let sync: TaskSync;

  beforeEach(() => {
    vi.useFakeTimers();
    api = new FakeTaskApi();
    sync = new TaskSync({ client: api, logger: silentLogger, pollIntervalMs: 3000 });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('watchTask', () => {
    it('polls a planned task until it completes', async () => {
      const planned = vi.fn();
      sync.on('task:planned', planned);

      const task = await sync.planTask('Summarize the quarterly report');
      expect(planned).toHaveBeenCalledWith(task);
      expect(sync.cache.details.getData(taskKeys.detail(task.id))?.status).toBe('pending_planning');

      const watch = sync.watchTask(task.id);
      expect(api.getTask).not.toHaveBeenCalled();

      api.seed({ id: task.id, name: task.name, status: 'running', progress: 0.3 });
      await vi.advanceTimersByTimeAsync(3000);
      expect(sync.cache.details.getData(taskKeys.detail(task.id))).toMatchObject({ status: 'running', progress: 0.3 });

      api.seed({ id: task.id, name: task.name, status: 'completed', progress: 1, endTime: 1700000100 });
      await vi.advanceTimersByTimeAsync(3000);
      expect(sync.cache.details.getData(taskKeys.detail(task.id))).toMatchObject({ status: 'completed', progress: 1 });
      expect(api.getTask).toHaveBeenCalledTimes(2);

      await vi.advanceTimersByTimeAsync(9000);
      expect(api.getTask).toHaveBeenCalledTimes(2);
      expect(vi.getTimerCount()).toBe(0);
      watch.unsubscribe();
    });

    it('keeps polling a settled task when stopWhenSettled is off', async () => {
      api.seed({ id: 't1', status: 'completed', progress: 1, endTime: 1700000100 });

      const watch = sync.watchTask('t1', { refetchInterval: 1000, stopWhenSettled: false });
      await sync.fetchTask('t1');
      await vi.advanceTimersByTimeAsync(2000);

      expect(api.getTask).toHaveBeenCalledTimes(3);
      watch.unsubscribe();
      expect(vi.getTimerCount()).toBe(0);
    });

    it('does nothing without an id', async () => {
      const watch = sync.watchTask(undefined);
      await vi.advanceTimersByTimeAsync(10000);

      expect(api.getTask).not.toHaveBeenCalled();
      expect(vi.getTimerCount()).toBe(0);
      expect(watch.active).toBe(true);
      watch.unsubscribe();
      expect(watch.active).toBe(false);
    });

    it('keeps the last good data when a poll fails, then recovers', async () => {
      api.seed({ id: 't1', status: 'running', progress: 0.3 });
      const pollFailed = vi.fn();
      sync.on('poll:failed', pollFailed);

      const watch = sync.watchTask('t1', { refetchInterval: 1000 });
      await sync.fetchTask('t1');

      const failure = new Error('socket hang up');
      api.getTask.mockRejectedValueOnce(failure);
      await vi.advanceTimersByTimeAsync(1000);

      expect(sync.cache.details.get(taskKeys.detail('t1'))).toMatchObject({
        status: 'stale',
        data: { status: 'running', progress: 0.3 },
        error: failure,
      });
      expect(pollFailed).toHaveBeenCalledWith(hashKey(taskKeys.detail('t1')), failure);

      await vi.advanceTimersByTimeAsync(1000);
      const entry = sync.cache.details.get(taskKeys.detail('t1'));
      expect(entry?.status).toBe('fresh');
      expect(entry?.error).toBeUndefined();
      watch.unsubscribe();
    });

    it('stops polling a task once it is deleted', async () => {
      api.seed({ id: 't1', status: 'running' });
      const watch = sync.watchTask('t1', { refetchInterval: 1000 });
      await sync.fetchTask('t1');

      await sync.deleteTask('t1');
      await vi.advanceTimersByTimeAsync(3000);

      expect(sync.cache.details.get(taskKeys.detail('t1'))).toBeUndefined();
      expect(api.getTask).toHaveBeenCalledTimes(1);
      expect(vi.getTimerCount()).toBe(0);
      watch.unsubscribe();
    });

    it('stops polling when the server no longer knows the task', async () => {
      api.seed({ id: 't1', status: 'running', progress: 0.4 });
      const pollFailed = vi.fn();
      sync.on('poll:failed', pollFailed);
      const watch = sync.watchTask('t1', { refetchInterval: 1000 });
      await sync.fetchTask('t1');

      api.tasks.delete('t1');
      await vi.advanceTimersByTimeAsync(4000);

      expect(api.getTask).toHaveBeenCalledTimes(2);
      expect(vi.getTimerCount()).toBe(0);
      const entry = sync.cache.details.get(taskKeys.detail('t1'));
      expect(entry?.error).toBeInstanceOf(NotFoundError);
      expect(entry?.data?.progress).toBe(0.4);
      expect(pollFailed).toHaveBeenCalledTimes(1);
      watch.unsubscribe();
    });

    it('stops polling once unsubscribed and tolerates a second unsubscribe', async () => {
      api.seed({ id: 't1', status: 'running' });
      const watch = sync.watchTask('t1');
      await sync.fetchTask('t1');

      watch.unsubscribe();
      watch.unsubscribe();
      await vi.advanceTimersByTimeAsync(9000);

      expect(api.getTask).toHaveBeenCalledTimes(1);
      expect(sync.cache.details.observerCount(taskKeys.detail('t1'))).toBe(0);
    });
  });

  describe('mutations', () => {
    it('invalidates the parent and its subtask list when a subtask is created', async () => {
      api.seed({ id: 'p1', name: 'Parent', status: 'running' });
      await sync.fetchTask('p1');
      await sync.fetchSubtasks('p1');

      const child = await sync.createTask({ name: 'Child', parentId: 'p1' });

      expect(sync.cache.details.get(taskKeys.detail('p1'))?.status).toBe('stale');
      expect(sync.cache.lists.get(taskKeys.list({ parentId: 'p1' }))?.status).toBe('stale');
      expect(sync.cache.details.get(taskKeys.detail(child.id))).toMatchObject({
        status: 'fresh',
        data: { name: 'Child', parentId: 'p1' },
      });
    });

    it('invalidates every cached list when a subtask is created', async () => {
      api.seed({ id: 'p1', name: 'Parent', status: 'running' });
      await sync.fetchTasks();
      await sync.fetchSubtasks('p1');

      await sync.createTask({ name: 'Child', parentId: 'p1' });

      expect(sync.cache.lists.get(taskKeys.list())?.status).toBe('stale');
      expect(sync.cache.lists.get(taskKeys.list({ parentId: 'p1' }))?.status).toBe('stale');
      expect(api.getTasks).toHaveBeenCalledTimes(2);
    });

    it('invalidates every cached list when a subtask is updated', async () => {
      api.seed({ id: 'p1', name: 'Parent', status: 'running' });
      api.seed({ id: 'c1', parentId: 'p1', status: 'running' });
      await sync.fetchTasks();
      await sync.fetchSubtasks('p1');

      await sync.updateTask('c1', { progress: 0.4 });

      expect(sync.cache.lists.get(taskKeys.list())?.status).toBe('stale');
      expect(sync.cache.lists.get(taskKeys.list({ parentId: 'p1' }))?.status).toBe('stale');
    });

    it('refetches watched lists once after an update', async () => {
      api.seed({ id: 'p1', name: 'Parent', status: 'running' });
      api.seed({ id: 'c1', parentId: 'p1', status: 'running' });
      const all = sync.watchTasks(undefined);
      const subtasks = sync.watchSubtasks('p1');
      await sync.fetchTasks();
      await sync.fetchSubtasks('p1');

      await sync.updateTask('c1', { progress: 0.7 });
      const [everything, children] = await Promise.all([sync.fetchTasks(), sync.fetchSubtasks('p1')]);

      expect(everything.find((t) => t.id === 'c1')?.progress).toBe(0.7);
      expect(children.map((t) => t.progress)).toEqual([0.7]);
      expect(api.getTasks).toHaveBeenCalledTimes(4);
      expect(sync.cache.lists.get(taskKeys.list({ parentId: 'p1' }))?.status).toBe('fresh');
      all.unsubscribe();
      subtasks.unsubscribe();
    });

    it('refetches a watched subtask list created into while its first fetch was pending', async () => {
      api.seed({ id: 'p1', name: 'Parent', status: 'running' });
      const first = deferred<Task[]>();
      api.getTasks.mockImplementationOnce(() => first.promise);
      const watch = sync.watchSubtasks('p1');
      const initial = sync.fetchSubtasks('p1');

      const child = await sync.createTask({ name: 'Child', parentId: 'p1' });
      first.resolve([]);
      await expect(initial).resolves.toEqual([]);

      const ids = (await sync.fetchSubtasks('p1')).map((t) => t.id);
      expect(ids).toEqual([child.id]);
      expect(api.getTasks).toHaveBeenCalledTimes(2);
      expect(sync.cache.lists.get(taskKeys.list({ parentId: 'p1' }))?.status).toBe('fresh');
      watch.unsubscribe();
    });

    it('makes an update visible without a refetch', async () => {
      api.seed({ id: 't1', status: 'running', progress: 0.2 });
      await sync.fetchTask('t1');

      await sync.updateTask('t1', { progress: 0.6 });

      expect(sync.cache.details.getData(taskKeys.detail('t1'))?.progress).toBe(0.6);
      expect(api.getTask).toHaveBeenCalledTimes(1);
    });

    it('applies an optimistic update and rolls it back on failure', async () => {
      api.seed({ id: 't1', status: 'running', progress: 0.2 });
      await sync.fetchTask('t1');
      const failed = vi.fn();
      sync.on('mutation:failed', failed);

      const response = deferred<Task>();
      api.updateTask.mockImplementationOnce(() => response.promise);
      const pending = sync.setProgress('t1', 0.8);
      expect(sync.cache.details.getData(taskKeys.detail('t1'))?.progress).toBe(0.8);

      const failure = new ServerError('Tasks API 500: boom', 500);
      response.reject(failure);
      await expect(pending).rejects.toBe(failure);

      expect(sync.cache.details.getData(taskKeys.detail('t1'))?.progress).toBe(0.2);
      expect(failed).toHaveBeenCalledWith('updateTask', failure);
    });

    it('keeps newer server data instead of rolling back over it', async () => {
      api.seed({ id: 't1', status: 'running', progress: 0.2 });
      await sync.fetchTask('t1');

      const response = deferred<Task>();
      api.updateTask.mockImplementationOnce(() => response.promise);
      const pending = sync.setProgress('t1', 0.8);

      api.seed({ id: 't1', status: 'running', progress: 0.5 });
      await sync.fetchTask('t1', { force: true });
      const failure = new ServerError('Tasks API 500: boom', 500);
      response.reject(failure);
      await expect(pending).rejects.toBe(failure);

      expect(sync.cache.details.get(taskKeys.detail('t1'))).toMatchObject({
        status: 'stale',
        data: { progress: 0.5 },
        fetching: false,
      });
    });

    it('rejects an out-of-range progress without touching the cache or the API', async () => {
      api.seed({ id: 't1', status: 'running', progress: 0.2 });
      await sync.fetchTask('t1');

      await expect(sync.setProgress('t1', 1.5)).rejects.toBeInstanceOf(ValidationError);

      expect(api.updateTask).not.toHaveBeenCalled();
      expect(sync.cache.details.getData(taskKeys.detail('t1'))?.progress).toBe(0.2);
    });

    it('drops a deleted task and reports a second delete as not found', async () => {
      api.seed({ id: 'p1', name: 'Parent' });
      api.seed({ id: 'c1', parentId: 'p1' });
      await sync.fetchTask('c1');
      await sync.fetchSubtasks('p1');
      const deleted = vi.fn();
      sync.on('task:deleted', deleted);

      await sync.deleteTask('c1');

      expect(sync.cache.details.get(taskKeys.detail('c1'))).toBeUndefined();
      expect(sync.cache.lists.get(taskKeys.list({ parentId: 'p1' }))?.status).toBe('stale');
      expect(deleted).toHaveBeenCalledWith('c1');
      await expect(sync.deleteTask('c1')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('watchSubtaskProgress', () => {
    it('recomputes progress when the subtask list changes', async () => {
      api.seed({ id: 'p1', name: 'Parent', status: 'running' });
      api.seed({ id: 'c1', parentId: 'p1', status: 'completed', progress: 1, endTime: 1700000100 });
      api.seed({ id: 'c2', parentId: 'p1', status: 'running', progress: 0.5 });
      const fractions: number[] = [];

      const watch = sync.watchSubtaskProgress('p1', (summary) => fractions.push(summary.completedFraction));
      await sync.fetchSubtasks('p1');

      await sync.updateTask('c2', { status: 'completed', progress: 1, endTime: 1700000200 });
      await sync.fetchSubtasks('p1');

      expect(fractions).toEqual([0.5, 1]);
      watch.unsubscribe();
    });
  });
});
