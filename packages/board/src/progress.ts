import type { Task, TaskStatus } from '@tasksync/client';

export interface SubtaskSummary {
  total: number;
  byStatus: Record<TaskStatus, number>;
  /** completed / total, 0 when there are no subtasks */
  completedFraction: number;
}

export function completedFraction(tasks: readonly Task[]): number {
  if (tasks.length === 0) return 0;
  return tasks.filter((t) => t.status === 'completed').length / tasks.length;
}

export function summarizeSubtasks(tasks: readonly Task[]): SubtaskSummary {
  const byStatus: Record<TaskStatus, number> = {
    pending: 0,
    pending_planning: 0,
    planning_failed: 0,
    planned: 0,
    running: 0,
    paused: 0,
    completed: 0,
    failed: 0,
  };
  for (const task of tasks) {
    byStatus[task.status] += 1;
  }
  return { total: tasks.length, byStatus, completedFraction: completedFraction(tasks) };
}
