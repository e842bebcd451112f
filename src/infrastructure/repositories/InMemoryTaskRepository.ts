import { Task, TaskCompletion } from '../../types';
import { ITaskRepository } from '../../domain/repositories/ITaskRepository';
import { ILogger } from '../../domain/common/ILogger';
import { ConflictError, InvalidStateError, NotFoundError } from '../../domain/common/Errors';
import { assertValidDependencies } from '../../domain/scheduling/DependencyGraph';
import { freezeContext } from '../common/deepFreeze';

/**
 * Point-in-time view over the tasks held when it was taken.
 */
class TaskSnapshot implements Iterable<Task> {
  constructor(private readonly tasks: readonly Task[]) {}

  *[Symbol.iterator](): Iterator<Task> {
    for (const task of this.tasks) {
      yield task;
    }
  }
}

function freeze(task: Task): Task {
  return Object.freeze({
    ...task,
    dependencies: Object.freeze([...task.dependencies]),
    artifacts: Object.freeze([...task.artifacts]),
    metadata: Object.freeze({
      ...task.metadata,
      projectContext: freezeContext(task.metadata.projectContext)
    })
  });
}

/**
 * In-memory implementation of ITaskRepository.
 *
 * Each method checks and writes within one synchronous step, so two calls can
 * never interleave between the check and the write. Stored tasks are frozen and
 * replaced wholesale on every mutation.
 */
export class InMemoryTaskRepository implements ITaskRepository {
  private tasks = new Map<string, Task>();

  constructor(private logger: ILogger) {}

  async create(task: Task): Promise<Task> {
    const [created] = await this.createMany([task]);
    return created;
  }

  async createMany(tasks: Task[]): Promise<Task[]> {
    const seen = new Set<string>();
    for (const task of tasks) {
      if (this.tasks.has(task.id) || seen.has(task.id)) {
        throw new ConflictError('Task', task.id);
      }
      seen.add(task.id);
    }
    assertValidDependencies(tasks, (id) => this.tasks.get(id));

    const frozen = tasks.map(freeze);
    for (const task of frozen) {
      this.tasks.set(task.id, task);
    }

    this.logger.debug(`Inserted ${frozen.length} task(s)`);
    return frozen;
  }

  async discard(ids: string[]): Promise<void> {
    for (const id of ids) {
      this.tasks.delete(id);
    }
    this.logger.debug(`Discarded ${ids.length} uncommitted task(s)`);
  }

  async findById(id: string): Promise<Task | null> {
    return this.tasks.get(id) || null;
  }

  async start(id: string): Promise<Task> {
    const task = this.tasks.get(id);
    if (!task) {
      throw new NotFoundError('Task', id);
    }
    if (task.status !== 'pending') {
      throw new InvalidStateError(`Task '${id}' cannot start from status '${task.status}'`, {
        status: task.status
      });
    }

    const started = freeze({ ...task, status: 'in_progress', startedAt: Date.now() });
    this.tasks.set(id, started);

    this.logger.debug(`Started task: ${id}`);
    return started;
  }

  async complete(id: string, completion: TaskCompletion): Promise<Task> {
    const task = this.tasks.get(id);
    if (!task) {
      throw new NotFoundError('Task', id);
    }
    if (task.status === 'completed') {
      throw new InvalidStateError(`Task '${id}' is already completed`, {
        completedAt: task.completedAt
      });
    }

    const completed = freeze({
      ...task,
      status: 'completed',
      output: completion.output,
      artifacts: completion.artifacts,
      completedAt: Date.now()
    });
    this.tasks.set(id, completed);

    this.logger.debug(`Completed task: ${id}`);
    return completed;
  }

  async list(): Promise<Iterable<Task>> {
    return new TaskSnapshot(Array.from(this.tasks.values()));
  }

  async count(): Promise<number> {
    return this.tasks.size;
  }
}
