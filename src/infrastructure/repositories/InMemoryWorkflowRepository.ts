import { Workflow } from '../../types';
import { IWorkflowRepository } from '../../domain/repositories/IWorkflowRepository';
import { ILogger } from '../../domain/common/ILogger';
import { ConflictError } from '../../domain/common/Errors';
import { freezeContext } from '../common/deepFreeze';

/**
 * In-memory implementation of IWorkflowRepository.
 */
export class InMemoryWorkflowRepository implements IWorkflowRepository {
  private workflows = new Map<string, Workflow>();

  constructor(private logger: ILogger) {}

  async create(workflow: Workflow): Promise<Workflow> {
    if (this.workflows.has(workflow.id)) {
      throw new ConflictError('Workflow', workflow.id);
    }

    const stored = Object.freeze({
      ...workflow,
      taskIds: Object.freeze([...workflow.taskIds]),
      projectContext: freezeContext(workflow.projectContext)
    });
    this.workflows.set(stored.id, stored);

    this.logger.debug(`Created workflow: ${stored.id}`);
    return stored;
  }

  async findById(id: string): Promise<Workflow | null> {
    return this.workflows.get(id) || null;
  }

  async findAll(): Promise<Workflow[]> {
    return Array.from(this.workflows.values());
  }

  async count(): Promise<number> {
    return this.workflows.size;
  }
}
