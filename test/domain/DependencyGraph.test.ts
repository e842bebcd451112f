import { assertValidDependencies, findDependencyCycle } from '../../src/domain/scheduling/DependencyGraph';
import { ValidationError } from '../../src/domain/common/Errors';
import { Task } from '../../src/types';
import { createTestTask } from '../helpers';

describe('DependencyGraph', () => {
  describe('findDependencyCycle', () => {
    const graph: Record<string, string[]> = {
      a: ['b'],
      b: ['c'],
      c: [],
    };

    it('returns null for an acyclic graph', () => {
      expect(findDependencyCycle(['a'], (id) => graph[id])).toBeNull();
    });

    it('treats unresolved ids as leaves', () => {
      expect(findDependencyCycle(['x'], (id) => (id === 'x' ? ['nowhere'] : undefined))).toBeNull();
    });

    it('returns the cycle path', () => {
      const cyclic: Record<string, string[]> = { a: ['b'], b: ['c'], c: ['a'] };
      expect(findDependencyCycle(['a'], (id) => cyclic[id])).toEqual(['a', 'b', 'c', 'a']);
    });
  });

  describe('assertValidDependencies', () => {
    const none = (): Task | undefined => undefined;

    it('accepts a linear chain', () => {
      const tasks = [
        createTestTask({ id: 't1' }),
        createTestTask({ id: 't2', dependencies: ['t1'] }),
        createTestTask({ id: 't3', dependencies: ['t2'] }),
      ];
      expect(() => assertValidDependencies(tasks, none)).not.toThrow();
    });

    it('rejects a self dependency', () => {
      const task = createTestTask({ id: 't1', dependencies: ['t1'] });
      expect(() => assertValidDependencies([task], none)).toThrow("Task 't1' cannot depend on itself");
    });

    it('rejects duplicate dependencies', () => {
      const task = createTestTask({ id: 't2', dependencies: ['t1', 't1'] });
      expect(() => assertValidDependencies([task], none)).toThrow(ValidationError);
    });

    it('rejects a cycle closed through stored tasks', () => {
      const stored = createTestTask({ id: 'old', dependencies: ['new'] });
      const candidate = createTestTask({ id: 'new', dependencies: ['old'] });

      let caught: unknown;
      try {
        assertValidDependencies([candidate], (id) => (id === 'old' ? stored : undefined));
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(ValidationError);
      expect(caught).toMatchObject({
        message: 'Task dependencies form a cycle',
        details: { cycle: ['new', 'old', 'new'] },
      });
    });

    it('allows dependencies on ids that do not exist', () => {
      const task = createTestTask({ id: 't1', dependencies: ['ghost'] });
      expect(() => assertValidDependencies([task], none)).not.toThrow();
    });
  });
});
