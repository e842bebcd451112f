import { Task } from '../../types';
import { ValidationError } from '../common/Errors';

type VisitState = 'visiting' | 'done';

/**
 * Depth-first search for a dependency cycle reachable from `startIds`.
 * Ids that `dependenciesOf` cannot resolve are treated as leaves.
 * @returns The cycle as a path that starts and ends on the same id, or null
 */
export function findDependencyCycle(
  startIds: Iterable<string>,
  dependenciesOf: (id: string) => readonly string[] | undefined
): string[] | null {
  const state = new Map<string, VisitState>();
  const path: string[] = [];

  const visit = (id: string): string[] | null => {
    const mark = state.get(id);
    if (mark === 'done') return null;
    if (mark === 'visiting') {
      return [...path.slice(path.indexOf(id)), id];
    }

    const deps = dependenciesOf(id);
    if (!deps) {
      state.set(id, 'done');
      return null;
    }

    state.set(id, 'visiting');
    path.push(id);
    for (const dep of deps) {
      const cycle = visit(dep);
      if (cycle) return cycle;
    }
    path.pop();
    state.set(id, 'done');
    return null;
  };

  for (const id of startIds) {
    const cycle = visit(id);
    if (cycle) return cycle;
  }
  return null;
}

/**
 * Reject candidate tasks whose dependency lists reference themselves, repeat an id,
 * or close a cycle through the candidates and the tasks already stored.
 * @throws {ValidationError}
 */
export function assertValidDependencies(
  candidates: readonly Task[],
  existing: (id: string) => Task | undefined
): void {
  const pending = new Map<string, Task>();
  for (const task of candidates) {
    if (task.dependencies.includes(task.id)) {
      throw new ValidationError(`Task '${task.id}' cannot depend on itself`);
    }
    if (new Set(task.dependencies).size !== task.dependencies.length) {
      throw new ValidationError(`Task '${task.id}' lists a dependency more than once`, {
        dependencies: task.dependencies
      });
    }
    pending.set(task.id, task);
  }

  const cycle = findDependencyCycle(
    pending.keys(),
    (id) => (pending.get(id) ?? existing(id))?.dependencies
  );
  if (cycle) {
    throw new ValidationError('Task dependencies form a cycle', { cycle });
  }
}
