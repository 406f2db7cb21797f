import { ValidationError } from './errors.js';
import { TASK_STATUSES, TERMINAL_STATUSES, type Task, type TaskStatus, type UpdateTaskPayload } from './types.js';

export function isTaskStatus(value: unknown): value is TaskStatus {
  return TASK_STATUSES.some((status) => status === value);
}

export function isTerminalStatus(status: TaskStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function isValidProgress(progress: number): boolean {
  return Number.isFinite(progress) && progress >= 0 && progress <= 1;
}

/**
 * A task may start once every dependency is completed. Dependencies that
 * `lookup` cannot resolve count as unmet.
 */
export function isRunnable(task: Task, lookup: (id: string) => Task | undefined): boolean {
  if (task.status === 'running' || isTerminalStatus(task.status)) return false;
  return task.dependencies.every((id) => lookup(id)?.status === 'completed');
}

/**
 * List the data-model rules a task breaks. Used to flag server responses,
 * so it reports instead of throwing.
 */
export function checkTaskInvariants(task: Task): string[] {
  const violations: string[] = [];
  if (!isValidProgress(task.progress)) {
    violations.push(`progress ${task.progress} outside [0, 1]`);
  }
  if (task.endTime != null) {
    if (task.endTime < task.startTime) {
      violations.push('endTime before startTime');
    }
    if (!isTerminalStatus(task.status)) {
      violations.push(`endTime set on ${task.status} task`);
    }
  }
  if (task.error != null && task.status !== 'failed' && task.status !== 'planning_failed') {
    violations.push(`error set on ${task.status} task`);
  }
  if (task.result != null && task.status !== 'completed') {
    violations.push(`result set on ${task.status} task`);
  }
  return violations;
}

// ============ Input Validation ============

export function assertTaskId(id: string): void {
  if (!id.trim()) {
    throw new ValidationError('Task id is required', 'id');
  }
}

export function assertProgress(progress: number | undefined): void {
  if (progress !== undefined && !isValidProgress(progress)) {
    throw new ValidationError(`Progress must be between 0 and 1, got ${progress}`, 'progress');
  }
}

export function assertStatus(status: string | undefined): void {
  if (status !== undefined && !isTaskStatus(status)) {
    throw new ValidationError(`Unknown task status: ${status}`, 'status');
  }
}

/** Checks an update before it is dispatched or applied optimistically */
export function validateTaskUpdate(updates: UpdateTaskPayload): void {
  assertProgress(updates.progress);
  assertStatus(updates.status);
}
