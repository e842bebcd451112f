import { Workflow } from '../../types';

/**
 * Repository interface for Workflow entities.
 * Workflows hold task ids by value and never govern task lifetime.
 */
export interface IWorkflowRepository {
  /**
   * Register a workflow.
   * @throws {ConflictError} if a workflow with the same id exists
   */
  create(workflow: Workflow): Promise<Workflow>;

  /**
   * Find a workflow by ID.
   * @returns The workflow if found, null otherwise
   */
  findById(id: string): Promise<Workflow | null>;

  /**
   * All workflows in creation order.
   */
  findAll(): Promise<Workflow[]>;

  count(): Promise<number>;
}
