export const TaskFilter = {
  All: 'all',
  Completed: 'completed',
  Pending: 'pending',
} as const;

export type TaskFilter = (typeof TaskFilter)[keyof typeof TaskFilter];

/** Selection predicate for a filter; listing only, never export or mutation */
export function matchesFilter(completed: boolean, filter: TaskFilter): boolean {
  switch (filter) {
    case TaskFilter.Completed: return completed;
    case TaskFilter.Pending: return !completed;
    default: return true;
  }
}
