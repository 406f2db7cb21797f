import { createContext, useContext, type ReactNode } from 'react';
import type { TaskSync } from './sync.js';

const TaskSyncContext = createContext<TaskSync | null>(null);

export function TaskSyncProvider({ sync, children }: { sync: TaskSync; children: ReactNode }) {
  return <TaskSyncContext.Provider value={sync}>{children}</TaskSyncContext.Provider>;
}

export function useTaskSync(): TaskSync {
  const sync = useContext(TaskSyncContext);
  if (!sync) {
    throw new Error('useTaskSync must be used inside <TaskSyncProvider>');
  }
  return sync;
}
