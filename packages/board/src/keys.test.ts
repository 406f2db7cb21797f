import { describe, expect, it } from 'vitest';
import { filterSignature, hashKey, taskKeys } from './keys.js';

describe('taskKeys', () => {
  it('maps an absent or empty filter to "all"', () => {
    expect(filterSignature()).toBe('all');
    expect(filterSignature({})).toBe('all');
    expect(filterSignature({ parentId: '' })).toBe('all');
    expect(taskKeys.list()).toEqual(['tasks', 'list', 'all']);
  });

  it('serialises filters in a fixed field order', () => {
    expect(filterSignature({ status: 'running', parentId: 'p1' })).toBe('{"parentId":"p1","status":"running"}');
    expect(hashKey(taskKeys.list({ status: 'running', parentId: 'p1' }))).toBe(
      hashKey(taskKeys.list({ parentId: 'p1', status: 'running' }))
    );
  });

  it('keeps details and lists apart', () => {
    expect(taskKeys.detail('t1')).toEqual(['tasks', 'detail', 't1']);
    expect(hashKey(taskKeys.detail('all'))).not.toBe(hashKey(taskKeys.list()));
  });
});
