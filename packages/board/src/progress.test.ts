import { describe, expect, it } from 'vitest';
import { completedFraction, summarizeSubtasks } from './progress.js';
import { makeTask } from './test-utils.js';

describe('subtask progress', () => {
  it('is zero for no subtasks', () => {
    expect(completedFraction([])).toBe(0);
    expect(summarizeSubtasks([])).toMatchObject({ total: 0, completedFraction: 0 });
  });

  it('counts completed subtasks over the total', () => {
    const subtasks = [
      makeTask({ id: 'a', status: 'completed' }),
      makeTask({ id: 'b', status: 'running' }),
      makeTask({ id: 'c', status: 'failed' }),
      makeTask({ id: 'd', status: 'completed' }),
    ];

    expect(completedFraction(subtasks)).toBe(0.5);
    const summary = summarizeSubtasks(subtasks);
    expect(summary.total).toBe(4);
    expect(summary.byStatus).toMatchObject({ completed: 2, running: 1, failed: 1, pending: 0 });
  });
});
