import {
  Task,
  Workflow,
  WorkflowView,
  WorkflowDetails,
  WorkflowProgress,
  WorkflowTemplate,
  CreateWorkflowPayload,
  CreateWorkflowResult
} from '../../types';
import { ITaskRepository } from '../../domain/repositories/ITaskRepository';
import { IWorkflowRepository } from '../../domain/repositories/IWorkflowRepository';
import { ICatalog } from '../../domain/catalog/ICatalog';
import { IEventBus } from '../../domain/events/IEventBus';
import { IIdGenerator } from '../../domain/common/IIdGenerator';
import { ILogger } from '../../domain/common/ILogger';
import { NotFoundError, UnknownTemplateError, ValidationError } from '../../domain/common/Errors';
import { indexById, selectEligible } from '../../domain/scheduling/Scheduler';
import { DurationTable, buildDurationTable, estimateDuration } from '../../domain/scheduling/DurationEstimator';
import { aggregateProgress, deriveWorkflowStatus } from '../../domain/scheduling/ProgressAggregator';
import { Mutex } from '../../domain/common/Mutex';

/**
 * Application service for workflow operations.
 * Instantiates templates into linear task chains and serves workflow views.
 */
export class WorkflowService {
  private durations: DurationTable;

  constructor(
    private taskRepo: ITaskRepository,
    private workflowRepo: IWorkflowRepository,
    private catalog: ICatalog,
    private eventBus: IEventBus,
    private idGenerator: IIdGenerator,
    private storeLock: Mutex,
    private logger: ILogger
  ) {
    this.durations = buildDurationTable(catalog);
  }

  /**
   * Create a workflow from its template.
   * The tasks and the workflow become visible together or not at all.
   */
  async createWorkflow(input: CreateWorkflowPayload): Promise<CreateWorkflowResult> {
    const template = this.catalog.getTemplate(input.type);
    if (!template) {
      throw new UnknownTemplateError(input.type);
    }
    if (!input.description || input.description.trim() === '') {
      throw new ValidationError('Workflow description is required');
    }

    const description = input.description.trim();
    const projectContext = input.projectContext ?? {};
    const workflowId = this.idGenerator.generate('wf');
    const createdAt = Date.now();

    const tasks: Task[] = [];
    let previous: Task | null = null;
    for (const agent of template.agents) {
      const task: Task = {
        id: this.idGenerator.generate('task'),
        description: `${agent}: ${description}`,
        agent,
        status: 'pending',
        dependencies: previous ? [previous.id] : [],
        priority: 'medium',
        output: null,
        artifacts: [],
        metadata: {
          workflowId,
          workflowType: template.id,
          projectContext
        },
        createdAt,
        startedAt: null,
        completedAt: null,
        estimatedDuration: estimateDuration(agent, template.id, this.durations)
      };
      tasks.push(task);
      previous = task;
    }

    const { workflow, stored, nextTask } = await this.storeLock.runExclusive(async () => {
      const stored = await this.taskRepo.createMany(tasks);

      let workflow: Workflow;
      try {
        workflow = await this.workflowRepo.create({
          id: workflowId,
          type: template.id,
          description,
          taskIds: stored.map(t => t.id),
          createdAt,
          projectContext
        });
      } catch (err) {
        await this.taskRepo.discard(stored.map(t => t.id));
        throw err;
      }

      const eligible = selectEligible(await this.taskRepo.list());
      return { workflow, stored, nextTask: eligible[0] ?? null };
    });

    this.logger.info(`Created workflow ${template.id} with ${stored.length} tasks`, { workflowId });

    await this.eventBus.emit('workflow:created', { ...workflow, status: 'active' });
    for (const task of stored) {
      await this.eventBus.emit('task:created', task);
    }

    return {
      workflowId: workflow.id,
      taskIds: [...workflow.taskIds],
      nextTask
    };
  }

  /**
   * Get a workflow with its tasks and progress.
   */
  async getWorkflow(id: string): Promise<WorkflowDetails> {
    return this.storeLock.runExclusive(async () => {
      const workflow = await this.workflowRepo.findById(id);
      if (!workflow) {
        throw new NotFoundError('Workflow', id);
      }

      const byId = indexById(await this.taskRepo.list());
      const lookup = (taskId: string) => byId.get(taskId);
      const tasks = workflow.taskIds
        .map(lookup)
        .filter((task): task is Task => task !== undefined);

      return {
        ...workflow,
        status: deriveWorkflowStatus(workflow, lookup),
        tasks,
        progress: aggregateProgress(workflow.id, workflow, lookup)
      };
    });
  }

  /**
   * List all workflows with their derived status.
   */
  async listWorkflows(): Promise<WorkflowView[]> {
    return this.storeLock.runExclusive(async () => {
      const workflows = await this.workflowRepo.findAll();
      const byId = indexById(await this.taskRepo.list());
      const lookup = (taskId: string) => byId.get(taskId);

      return workflows.map(workflow => ({
        ...workflow,
        status: deriveWorkflowStatus(workflow, lookup)
      }));
    });
  }

  /**
   * Progress of one workflow. Unknown ids yield an all-zero result.
   */
  async getProgress(workflowId: string): Promise<WorkflowProgress> {
    return this.storeLock.runExclusive(async () => {
      const workflow = await this.workflowRepo.findById(workflowId);
      const byId = indexById(await this.taskRepo.list());
      return aggregateProgress(workflowId, workflow, (taskId) => byId.get(taskId));
    });
  }

  listTemplates(): WorkflowTemplate[] {
    return this.catalog.listTemplates();
  }

  getTemplate(type: string): WorkflowTemplate {
    const template = this.catalog.getTemplate(type);
    if (!template) {
      throw new NotFoundError('Workflow template', type);
    }
    return template;
  }
}
