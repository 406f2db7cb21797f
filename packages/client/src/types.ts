/**
 * Type definitions for the tasksync task client
 *
 * Field names follow the REST wire format (camelCase), which consumers
 * depend on regardless of how the backend stores rows.
 */

import type { Logger } from 'pino';

// ============ Task Types ============

export const TASK_STATUSES = [
  'pending',
  'pending_planning',
  'planning_failed',
  'planned',
  'running',
  'paused',
  'completed',
  'failed',
] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

/** Statuses after which a task no longer changes on its own */
export const TERMINAL_STATUSES: readonly TaskStatus[] = ['completed', 'failed', 'planning_failed'];

export interface Artifact {
  type: string;
  uri?: string;
  description?: string;
  content?: string;
}

export interface Task {
  id: string;
  name: string;
  description?: string | null;
  status: TaskStatus;
  progress: number; // 0.0 to 1.0
  startTime: number; // Unix timestamp, seconds
  endTime?: number | null;
  parentId?: string | null;
  subtasks: string[];
  dependencies: string[];
  assignedTools: string[];
  artifacts: Artifact[];
  metadata: Record<string, unknown>;
  error?: string | null;
  result?: unknown;
}

// ============ Payloads ============

export interface CreateTaskPayload {
  name: string;
  description?: string | null;
  parentId?: string | null;
  dependencies?: string[];
  assignedTools?: string[];
  metadata?: Record<string, unknown>;
  status?: TaskStatus;
  progress?: number;
}

export interface PlanTaskPayload {
  description: string;
  context?: Record<string, unknown>;
}

/** Partial update: only the fields present are sent and changed */
export interface UpdateTaskPayload {
  name?: string;
  description?: string | null;
  status?: TaskStatus;
  progress?: number;
  dependencies?: string[];
  assignedTools?: string[];
  artifacts?: Artifact[];
  metadata?: Record<string, unknown>;
  error?: string | null;
  result?: unknown;
  endTime?: number | null;
}

export interface TaskFilters {
  parentId?: string;
  status?: TaskStatus;
}

// ============ Client Options ============

export interface TaskClientOptions {
  /** API root, e.g. http://localhost:8000/api (default: $TASKSYNC_API_URL) */
  baseUrl?: string;
  /** fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
  /** Extra headers sent with every request */
  headers?: Record<string, string>;
  /** Per-request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  logger?: Logger;
}

/** Read-only view of the operations the sync layer needs */
export interface TaskApi {
  planTask(description: string, context?: Record<string, unknown>): Promise<Task>;
  createTask(payload: CreateTaskPayload): Promise<Task>;
  getTasks(filters?: TaskFilters): Promise<Task[]>;
  getTask(id: string): Promise<Task>;
  updateTask(id: string, updates: UpdateTaskPayload): Promise<Task>;
  deleteTask(id: string): Promise<void>;
}
