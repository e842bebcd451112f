import {
  Task,
  CreateTaskPayload,
  CompleteTaskPayload,
  CompleteTaskResult
} from '../../types';
import { ITaskRepository } from '../../domain/repositories/ITaskRepository';
import { IWorkflowRepository } from '../../domain/repositories/IWorkflowRepository';
import { ICatalog } from '../../domain/catalog/ICatalog';
import { IEventBus } from '../../domain/events/IEventBus';
import { IIdGenerator } from '../../domain/common/IIdGenerator';
import { ILogger } from '../../domain/common/ILogger';
import { InvalidStateError, NotFoundError, ValidationError } from '../../domain/common/Errors';
import { Mutex } from '../../domain/common/Mutex';
import { indexById, selectEligible } from '../../domain/scheduling/Scheduler';
import { DurationTable, buildDurationTable, estimateDuration } from '../../domain/scheduling/DurationEstimator';
import { aggregateProgress } from '../../domain/scheduling/ProgressAggregator';

/**
 * Application service for task operations.
 * Owns the task lifecycle and recomputes scheduling state after each change.
 */
export class TaskService {
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
   * Create a standalone task with an arbitrary dependency list.
   */
  async createTask(input: CreateTaskPayload): Promise<Task> {
    if (!input.description || input.description.trim() === '') {
      throw new ValidationError('Task description is required');
    }
    if (!this.catalog.getAgent(input.agent)) {
      throw new ValidationError(`Unknown agent: ${input.agent}`);
    }

    const task = await this.storeLock.runExclusive(async () => {
      const dependencies = input.dependencies ?? [];
      const missing: string[] = [];
      for (const depId of dependencies) {
        if (!(await this.taskRepo.findById(depId))) {
          missing.push(depId);
        }
      }
      if (missing.length > 0) {
        throw new ValidationError('Task dependencies reference unknown tasks', { missing });
      }

      return this.taskRepo.create({
        id: this.idGenerator.generate('task'),
        description: input.description.trim(),
        agent: input.agent,
        status: 'pending',
        dependencies,
        priority: input.priority ?? 'medium',
        output: null,
        artifacts: [],
        metadata: { projectContext: input.projectContext ?? {} },
        createdAt: Date.now(),
        startedAt: null,
        completedAt: null,
        estimatedDuration: estimateDuration(input.agent, null, this.durations)
      });
    });

    await this.eventBus.emit('task:created', task);

    return task;
  }

  /**
   * Get a task by ID.
   */
  async getTask(id: string): Promise<Task> {
    const task = await this.taskRepo.findById(id);
    if (!task) {
      throw new NotFoundError('Task', id);
    }
    return task;
  }

  /**
   * Tasks ready to run, in scheduling order.
   */
  async listEligibleTasks(): Promise<Task[]> {
    return this.storeLock.runExclusive(async () => selectEligible(await this.taskRepo.list()));
  }

  /**
   * Mark an eligible task as in progress.
   */
  async startTask(id: string): Promise<Task> {
    const task = await this.storeLock.runExclusive(async () => {
      const current = await this.taskRepo.findById(id);
      if (!current) {
        throw new NotFoundError('Task', id);
      }

      const unmet: string[] = [];
      for (const depId of current.dependencies) {
        const dependency = await this.taskRepo.findById(depId);
        if (dependency?.status !== 'completed') {
          unmet.push(depId);
        }
      }
      if (current.status === 'pending' && unmet.length > 0) {
        throw new InvalidStateError(`Task '${id}' has unfinished dependencies`, { unmet });
      }

      return this.taskRepo.start(id);
    });

    this.logger.info(`Started task ${id} for agent ${task.agent}`);
    await this.eventBus.emit('task:started', task);

    return task;
  }

  /**
   * Complete a task, then recompute the eligible list and the progress of
   * the task's workflow.
   */
  async completeTask(id: string, input: CompleteTaskPayload): Promise<CompleteTaskResult> {
    const result = await this.storeLock.runExclusive(async () => {
      const completedTask = await this.taskRepo.complete(id, {
        output: input.output,
        artifacts: input.artifacts ?? []
      });

      const snapshot = await this.taskRepo.list();
      const byId = indexById(snapshot);
      const workflowId = completedTask.metadata.workflowId ?? null;
      const workflow = workflowId ? await this.workflowRepo.findById(workflowId) : null;

      return {
        completedTask,
        nextTasks: selectEligible(snapshot),
        workflowProgress: aggregateProgress(workflowId, workflow, (taskId) => byId.get(taskId))
      };
    });

    const { completedTask, workflowProgress } = result;
    this.logger.info(`Completed task ${id} for agent ${completedTask.agent}`, {
      workflowId: workflowProgress.workflowId,
      nextTasks: result.nextTasks.length
    });
    if (input.nextAgentHint) {
      this.logger.info(`Handoff hint from ${completedTask.agent}: ${input.nextAgentHint}`, { taskId: id });
    }

    await this.eventBus.emit('task:completed', completedTask);
    if (
      workflowProgress.workflowId !== null &&
      workflowProgress.total > 0 &&
      workflowProgress.completed === workflowProgress.total
    ) {
      await this.eventBus.emit('workflow:completed', {
        workflowId: workflowProgress.workflowId,
        type: completedTask.metadata.workflowType ?? 'unknown'
      });
    }

    return result;
  }
}
