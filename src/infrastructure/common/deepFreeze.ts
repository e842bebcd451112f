import { ProjectContext } from '../../types';

/**
 * Freeze a value and everything reachable from it.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Private, fully frozen copy of caller-supplied context. The stored copy shares
 * nothing with the caller or with other stored entities.
 */
export function freezeContext(context: ProjectContext): ProjectContext {
  return deepFreeze(structuredClone(context));
}
