import { Task, TaskCompletion } from '../../types';

/**
 * Repository interface for Task persistence operations.
 *
 * Every mutation is applied as a single step: the stored task is replaced by a new
 * frozen object, so callers never see a partially updated task.
 */
export interface ITaskRepository {
  /**
   * Insert a new task.
   * @throws {ConflictError} if a task with the same id exists
   * @throws {ValidationError} if its dependencies reference itself or close a cycle
   */
  create(task: Task): Promise<Task>;

  /**
   * Insert a batch of tasks. Either every task is inserted or none is.
   * @throws {ConflictError} if any id exists or repeats within the batch
   * @throws {ValidationError} if the batch introduces a dependency cycle
   */
  createMany(tasks: Task[]): Promise<Task[]>;

  /**
   * Remove tasks inserted by a batch that was never published.
   * Only used to roll back a failed workflow creation.
   */
  discard(ids: string[]): Promise<void>;

  /**
   * Find a task by ID.
   * @returns The task if found, null otherwise
   */
  findById(id: string): Promise<Task | null>;

  /**
   * Move a pending task to in_progress.
   * @throws {NotFoundError} if task not found
   * @throws {InvalidStateError} if the task is not pending
   */
  start(id: string): Promise<Task>;

  /**
   * Complete a task exactly once.
   * @throws {NotFoundError} if task not found
   * @throws {InvalidStateError} if the task is already completed
   */
  complete(id: string, completion: TaskCompletion): Promise<Task>;

  /**
   * Snapshot of every task in insertion order.
   * The returned iterable can be walked any number of times and never reflects
   * mutations made after the call.
   */
  list(): Promise<Iterable<Task>>;

  /**
   * Count total tasks.
   */
  count(): Promise<number>;
}
