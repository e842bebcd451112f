import { TaskService } from '../../src/application/services/TaskService';
import { WorkflowService } from '../../src/application/services/WorkflowService';
import { InMemoryTaskRepository } from '../../src/infrastructure/repositories/InMemoryTaskRepository';
import { InMemoryWorkflowRepository } from '../../src/infrastructure/repositories/InMemoryWorkflowRepository';
import { InMemoryEventBus } from '../../src/infrastructure/events/InMemoryEventBus';
import { ILogger } from '../../src/domain/common/ILogger';
import { Mutex } from '../../src/domain/common/Mutex';
import { InvalidStateError, NotFoundError, ValidationError } from '../../src/domain/common/Errors';
import { SequentialIdGenerator, createMockLogger, createTestCatalog } from '../helpers';

describe('TaskService', () => {
  let logger: jest.Mocked<ILogger>;
  let eventBus: InMemoryEventBus;
  let taskService: TaskService;
  let workflowService: WorkflowService;

  beforeEach(() => {
    logger = createMockLogger();
    const catalog = createTestCatalog();
    const idGenerator = new SequentialIdGenerator();
    const storeLock = new Mutex();
    const taskRepo = new InMemoryTaskRepository(logger);
    const workflowRepo = new InMemoryWorkflowRepository(logger);
    eventBus = new InMemoryEventBus(logger);
    taskService = new TaskService(taskRepo, workflowRepo, catalog, eventBus, idGenerator, storeLock, logger);
    workflowService = new WorkflowService(taskRepo, workflowRepo, catalog, eventBus, idGenerator, storeLock, logger);
  });

  describe('createTask', () => {
    it('creates a standalone pending task', async () => {
      const task = await taskService.createTask({
        description: '  Write the changelog  ',
        agent: 'beta',
        priority: 'high',
      });

      expect(task).toMatchObject({
        id: 'task_1',
        description: 'Write the changelog',
        agent: 'beta',
        status: 'pending',
        dependencies: [],
        priority: 'high',
        estimatedDuration: 25,
        metadata: { projectContext: {} },
      });
      expect(task.metadata.workflowId).toBeUndefined();
    });

    it('defaults priority to medium', async () => {
      const task = await taskService.createTask({ description: 'x', agent: 'alpha' });
      expect(task.priority).toBe('medium');
    });

    it('rejects an unknown agent', async () => {
      await expect(taskService.createTask({ description: 'x', agent: 'nobody' }))
        .rejects.toThrow('Unknown agent: nobody');
    });

    it('rejects dependencies on tasks that do not exist', async () => {
      await expect(taskService.createTask({ description: 'x', agent: 'alpha', dependencies: ['task_ghost'] }))
        .rejects.toMatchObject({
          code: 'VALIDATION_ERROR',
          details: { missing: ['task_ghost'] },
        });
    });

    it('rejects duplicate dependencies', async () => {
      const dep = await taskService.createTask({ description: 'dep', agent: 'alpha' });
      await expect(taskService.createTask({ description: 'x', agent: 'alpha', dependencies: [dep.id, dep.id] }))
        .rejects.toThrow(ValidationError);
    });

    it('puts high priority work ahead of earlier medium work', async () => {
      const medium = await taskService.createTask({ description: 'medium', agent: 'alpha' });
      const high = await taskService.createTask({ description: 'high', agent: 'alpha', priority: 'high' });

      const eligible = await taskService.listEligibleTasks();
      expect(eligible.map(t => t.id)).toEqual([high.id, medium.id]);
    });
  });

  describe('getTask', () => {
    it('throws NotFoundError for an unknown id', async () => {
      await expect(taskService.getTask('task_missing')).rejects.toThrow("Task with id 'task_missing' not found");
    });
  });

  describe('startTask', () => {
    it('starts an eligible task and removes it from the eligible list', async () => {
      const task = await taskService.createTask({ description: 'x', agent: 'alpha' });
      const started = jest.fn();
      eventBus.on('task:started', started);

      const result = await taskService.startTask(task.id);

      expect(result.status).toBe('in_progress');
      expect(started).toHaveBeenCalledWith(result);
      expect(await taskService.listEligibleTasks()).toEqual([]);
    });

    it('refuses to start a task whose dependencies are unfinished', async () => {
      const { taskIds } = await workflowService.createWorkflow({ type: 'pipeline', description: 'Ship' });

      await expect(taskService.startTask(taskIds[1])).rejects.toMatchObject({
        code: 'INVALID_STATE',
        details: { unmet: [taskIds[0]] },
      });
      expect((await taskService.getTask(taskIds[1])).status).toBe('pending');
    });

    it('refuses to start a completed task', async () => {
      const task = await taskService.createTask({ description: 'x', agent: 'alpha' });
      await taskService.completeTask(task.id, { output: 'done' });

      await expect(taskService.startTask(task.id)).rejects.toThrow(InvalidStateError);
    });

    it('throws NotFoundError for an unknown id', async () => {
      await expect(taskService.startTask('task_missing')).rejects.toThrow(NotFoundError);
    });
  });

  describe('completeTask', () => {
    it('records output and artifacts', async () => {
      const task = await taskService.createTask({ description: 'x', agent: 'alpha' });

      const result = await taskService.completeTask(task.id, { output: 'Done', artifacts: ['notes.md'] });

      expect(result.completedTask).toMatchObject({
        status: 'completed',
        output: 'Done',
        artifacts: ['notes.md'],
      });
      expect(result.workflowProgress).toEqual({ workflowId: null, total: 0, completed: 0, percentage: 0 });
    });

    it('lets exactly one of two concurrent completions succeed', async () => {
      const task = await taskService.createTask({ description: 'x', agent: 'alpha' });

      const results = await Promise.allSettled([
        taskService.completeTask(task.id, { output: 'first' }),
        taskService.completeTask(task.id, { output: 'second' }),
      ]);

      const fulfilled = results.filter(r => r.status === 'fulfilled');
      const rejected = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
      expect(fulfilled).toHaveLength(1);
      expect(rejected).toHaveLength(1);
      expect(rejected[0].reason).toBeInstanceOf(InvalidStateError);
      expect((await taskService.getTask(task.id)).output).toBe('first');
    });

    it('emits workflow:completed when the last task finishes', async () => {
      const workflowCompleted = jest.fn();
      eventBus.on('workflow:completed', workflowCompleted);
      const { workflowId, taskIds } = await workflowService.createWorkflow({ type: 'pipeline', description: 'Ship' });

      await taskService.completeTask(taskIds[0], { output: 'a' });
      await taskService.completeTask(taskIds[1], { output: 'b' });
      expect(workflowCompleted).not.toHaveBeenCalled();

      const last = await taskService.completeTask(taskIds[2], { output: 'c' });
      expect(last.workflowProgress.percentage).toBe(100);
      expect(last.nextTasks).toEqual([]);
      expect(workflowCompleted).toHaveBeenCalledWith({ workflowId, type: 'pipeline' });
    });

    it('logs the handoff hint', async () => {
      const task = await taskService.createTask({ description: 'x', agent: 'alpha' });

      await taskService.completeTask(task.id, { output: 'Done', nextAgentHint: 'beta' });

      expect(logger.info).toHaveBeenCalledWith('Handoff hint from alpha: beta', { taskId: task.id });
    });

    it('throws NotFoundError for an unknown id', async () => {
      await expect(taskService.completeTask('task_missing', { output: 'x' })).rejects.toThrow(NotFoundError);
    });
  });
});
