/**
 * Keyed query cache
 *
 * Each QueryStore wraps a zustand store holding one entry per cache key.
 * Entries move absent -> loading -> fresh -> stale -> loading -> fresh.
 * Concurrent fetches of the same key share one request, and a failed fetch
 * keeps the last good data next to the error. An invalidation that arrives
 * while a fetch is in flight lands that fetch's result as stale.
 */

import { toError, type Task } from '@tasksync/client';
import type { Logger } from 'pino';
import { subscribeWithSelector } from 'zustand/middleware';
import { createStore } from 'zustand/vanilla';
import { hashKey, type DetailKey, type ListKey } from './keys.js';

export type EntryStatus = 'loading' | 'fresh' | 'stale';

export interface CacheEntry<T> {
  status: EntryStatus;
  data?: T;
  error?: Error;
  dataUpdatedAt: number;
  errorUpdatedAt: number;
  fetching: boolean;
}

export interface QueryState<T> {
  entries: Record<string, CacheEntry<T>>;
}

export interface FetchOptions {
  /** Refetch even when the entry is fresh */
  force?: boolean;
}

export type EntryListener<T> = (entry: CacheEntry<T> | undefined) => void;

export class QueryStore<T, K extends readonly string[]> {
  readonly store = createStore<QueryState<T>>()(subscribeWithSelector(() => ({ entries: {} })));

  private inflight = new Map<string, Promise<T>>();
  private generations = new Map<string, number>();
  private fetchers = new Map<string, () => Promise<T>>();
  private observers = new Map<string, number>();
  private invalidatedInFlight = new Set<string>();

  constructor(
    private readonly logger: Logger,
    private readonly now: () => number = Date.now
  ) {}

  get(key: K): CacheEntry<T> | undefined {
    return this.read(hashKey(key));
  }

  getData(key: K): T | undefined {
    return this.get(key)?.data;
  }

  keys(): string[] {
    return Object.keys(this.store.getState().entries);
  }

  /** Selector for a single entry, for use with zustand's useStore */
  selectEntry(key: K): (state: QueryState<T>) => CacheEntry<T> | undefined {
    const hash = hashKey(key);
    return (state) => state.entries[hash];
  }

  /** Authoritative overwrite: the entry becomes fresh and its error clears */
  setData(key: K, data: T): void {
    const hash = hashKey(key);
    const previous = this.read(hash);
    this.write(hash, {
      status: 'fresh',
      data,
      dataUpdatedAt: this.now(),
      errorUpdatedAt: previous?.errorUpdatedAt ?? 0,
      fetching: previous?.fetching ?? false,
    });
  }

  /**
   * Mark an entry stale. Observed entries refetch right away; the rest
   * refetch on their next read.
   */
  invalidate(key: K): void {
    this.invalidateHash(hashKey(key));
  }

  invalidateAll(): void {
    for (const hash of this.keys()) {
      this.invalidateHash(hash);
    }
  }

  /** Drop an entry entirely. A fetch already in flight for it is discarded. */
  remove(key: K): void {
    const hash = hashKey(key);
    this.generations.set(hash, (this.generations.get(hash) ?? 0) + 1);
    this.inflight.delete(hash);
    this.invalidatedInFlight.delete(hash);
    this.store.setState((state) => {
      const { [hash]: _removed, ...entries } = state.entries;
      return { entries };
    });
  }

  /** Copy of the current entry, for rolling back an optimistic write */
  snapshot(key: K): CacheEntry<T> | undefined {
    const entry = this.get(key);
    return entry ? { ...entry } : undefined;
  }

  /** Put a snapshot back, keeping the live `fetching` flag */
  restore(key: K, entry: CacheEntry<T> | undefined): void {
    if (entry) {
      const hash = hashKey(key);
      this.write(hash, { ...entry, fetching: this.inflight.has(hash) });
    } else {
      this.remove(key);
    }
  }

  async fetch(key: K, fn: () => Promise<T>, options: FetchOptions = {}): Promise<T> {
    const hash = hashKey(key);
    const pending = this.inflight.get(hash);
    if (pending) return pending;

    const entry = this.read(hash);
    if (!options.force && entry?.status === 'fresh' && entry.data !== undefined) {
      return entry.data;
    }

    const request = this.run(hash, fn);
    this.inflight.set(hash, request);
    return request;
  }

  /**
   * Register interest in a key. While observed, invalidation refetches
   * through `fetcher`, which loads the data itself rather than going through
   * `fetch`. Returns the release function.
   */
  observe(key: K, fetcher: () => Promise<T>): () => void {
    const hash = hashKey(key);
    this.fetchers.set(hash, fetcher);
    this.observers.set(hash, (this.observers.get(hash) ?? 0) + 1);

    return () => {
      const count = (this.observers.get(hash) ?? 1) - 1;
      if (count > 0) {
        this.observers.set(hash, count);
      } else {
        this.observers.delete(hash);
        this.fetchers.delete(hash);
      }
    };
  }

  observerCount(key: K): number {
    return this.observers.get(hashKey(key)) ?? 0;
  }

  subscribe(key: K, listener: EntryListener<T>): () => void {
    return this.store.subscribe(this.selectEntry(key), listener);
  }

  clear(): void {
    for (const hash of this.keys()) {
      this.generations.set(hash, (this.generations.get(hash) ?? 0) + 1);
    }
    this.inflight.clear();
    this.invalidatedInFlight.clear();
    this.store.setState({ entries: {} });
  }

  // ============ Internals ============

  private read(hash: string): CacheEntry<T> | undefined {
    return this.store.getState().entries[hash];
  }

  private write(hash: string, entry: CacheEntry<T>): void {
    this.store.setState((state) => ({ entries: { ...state.entries, [hash]: entry } }));
  }

  private patch(hash: string, changes: Partial<CacheEntry<T>>): void {
    const entry = this.read(hash);
    if (entry) {
      this.write(hash, { ...entry, ...changes });
    }
  }

  private isCurrent(hash: string, generation: number): boolean {
    return (this.generations.get(hash) ?? 0) === generation;
  }

  private invalidateHash(hash: string): void {
    const entry = this.read(hash);
    if (!entry) return;
    if (entry.status === 'fresh') {
      this.patch(hash, { status: 'stale' });
    }

    if (this.inflight.has(hash)) {
      this.invalidatedInFlight.add(hash);
    } else {
      this.refetch(hash);
    }
  }

  /** Background refetch of an observed key; no-op when unobserved or busy */
  private refetch(hash: string): void {
    const fetcher = this.fetchers.get(hash);
    if (!fetcher || this.inflight.has(hash)) return;

    const request = this.run(hash, fetcher);
    this.inflight.set(hash, request);
    request.catch((err: unknown) => {
      this.logger.debug({ key: hash, err }, 'Background refetch failed');
    });
  }

  private async run(hash: string, fn: () => Promise<T>): Promise<T> {
    const generation = this.generations.get(hash) ?? 0;
    const previous = this.read(hash);
    this.write(hash, {
      status: 'loading',
      data: previous?.data,
      error: previous?.error,
      dataUpdatedAt: previous?.dataUpdatedAt ?? 0,
      errorUpdatedAt: previous?.errorUpdatedAt ?? 0,
      fetching: true,
    });

    // Set when an invalidation arrived during this request
    let outdated = false;
    try {
      const data = await fn();
      if (this.isCurrent(hash, generation)) {
        outdated = this.invalidatedInFlight.delete(hash);
        this.write(hash, {
          status: outdated ? 'stale' : 'fresh',
          data,
          dataUpdatedAt: this.now(),
          errorUpdatedAt: this.read(hash)?.errorUpdatedAt ?? 0,
          fetching: false,
        });
      }
      return data;
    } catch (err) {
      const error = toError(err);
      if (this.isCurrent(hash, generation)) {
        outdated = this.invalidatedInFlight.delete(hash);
        this.patch(hash, { status: 'stale', error, errorUpdatedAt: this.now(), fetching: false });
      }
      throw error;
    } finally {
      if (this.isCurrent(hash, generation)) {
        this.inflight.delete(hash);
        if (outdated) {
          this.refetch(hash);
        }
      }
    }
  }
}

/** Detail and list stores for tasks, constructed explicitly per app */
export class TaskCache {
  readonly details: QueryStore<Task, DetailKey>;
  readonly lists: QueryStore<Task[], ListKey>;

  constructor(logger: Logger, now?: () => number) {
    this.details = new QueryStore<Task, DetailKey>(logger, now);
    this.lists = new QueryStore<Task[], ListKey>(logger, now);
  }

  clear(): void {
    this.details.clear();
    this.lists.clear();
  }
}
