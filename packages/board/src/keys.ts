import type { TaskFilters } from '@tasksync/client';

/**
 * Canonical form of a list filter: fields in a fixed order, empty values
 * dropped. No filter at all maps to "all".
 */
export function filterSignature(filters?: TaskFilters): string {
  const canonical: TaskFilters = {};
  if (filters?.parentId) canonical.parentId = filters.parentId;
  if (filters?.status) canonical.status = filters.status;
  return Object.keys(canonical).length > 0 ? JSON.stringify(canonical) : 'all';
}

const ROOT = 'tasks';

export const taskKeys = {
  all: [ROOT] as const,
  lists: () => [ROOT, 'list'] as const,
  list: (filters?: TaskFilters) => [ROOT, 'list', filterSignature(filters)] as const,
  details: () => [ROOT, 'detail'] as const,
  detail: (id: string) => [ROOT, 'detail', id] as const,
};

export type ListKey = ReturnType<typeof taskKeys.list>;
export type DetailKey = ReturnType<typeof taskKeys.detail>;

export function hashKey(key: readonly string[]): string {
  return JSON.stringify(key);
}
