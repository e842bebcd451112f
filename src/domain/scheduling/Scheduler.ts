import { Task, TaskPriority } from '../../types';

export type TaskLookup = (id: string) => Task | undefined;

export const PRIORITY_RANK: Readonly<Record<TaskPriority, number>> = {
  high: 0,
  medium: 1,
  low: 2
};

/**
 * A task is eligible when it is pending and every dependency resolves to a
 * completed task. An id that resolves to nothing never counts as satisfied.
 */
export function isEligible(task: Task, lookup: TaskLookup): boolean {
  if (task.status !== 'pending') return false;
  return task.dependencies.every(depId => lookup(depId)?.status === 'completed');
}

/**
 * Orders by priority rank, then creation time. Equal keys compare as 0 so the
 * stable sort keeps store insertion order.
 */
export function compareForScheduling(a: Task, b: Task): number {
  const byRank = PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority];
  if (byRank !== 0) return byRank;
  return a.createdAt - b.createdAt;
}

export function indexById(snapshot: Iterable<Task>): ReadonlyMap<string, Task> {
  const byId = new Map<string, Task>();
  for (const task of snapshot) {
    byId.set(task.id, task);
  }
  return byId;
}

/**
 * Compute the ordered list of eligible tasks from a store snapshot.
 * Pure: the same snapshot always yields the same list.
 */
export function selectEligible(snapshot: Iterable<Task>): Task[] {
  const byId = indexById(snapshot);
  const lookup: TaskLookup = (id) => byId.get(id);
  return Array.from(byId.values())
    .filter(task => isEligible(task, lookup))
    .sort(compareForScheduling);
}
