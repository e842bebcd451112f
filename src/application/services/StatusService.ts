import { SystemStatus, TaskStatus } from '../../types';
import { ITaskRepository } from '../../domain/repositories/ITaskRepository';
import { IWorkflowRepository } from '../../domain/repositories/IWorkflowRepository';
import { ICatalog } from '../../domain/catalog/ICatalog';
import { Mutex } from '../../domain/common/Mutex';
import { indexById, selectEligible } from '../../domain/scheduling/Scheduler';
import { deriveWorkflowStatus } from '../../domain/scheduling/ProgressAggregator';

export const SERVICE_NAME = 'Development Team Orchestrator';
export const SERVICE_VERSION = '1.0.0';

const STATUS_PREVIEW_TASKS = 3;

export interface ServiceInfo {
  message: string;
  version: string;
  status: 'active';
  availableWorkflows: string[];
  activeAgents: number;
}

/**
 * System-wide summaries over both stores.
 */
export class StatusService {
  constructor(
    private taskRepo: ITaskRepository,
    private workflowRepo: IWorkflowRepository,
    private catalog: ICatalog,
    private storeLock: Mutex
  ) {}

  getServiceInfo(): ServiceInfo {
    return {
      message: SERVICE_NAME,
      version: SERVICE_VERSION,
      status: 'active',
      availableWorkflows: this.catalog.listTemplates().map(t => t.id),
      activeAgents: this.catalog.listAgents().length
    };
  }

  async getSystemStatus(): Promise<SystemStatus> {
    return this.storeLock.runExclusive(async () => {
      const snapshot = await this.taskRepo.list();
      const workflows = await this.workflowRepo.findAll();

      const counts: Record<TaskStatus, number> = {
        pending: 0,
        in_progress: 0,
        completed: 0,
        blocked: 0
      };
      let totalTasks = 0;
      for (const task of snapshot) {
        counts[task.status]++;
        totalTasks++;
      }

      const byId = indexById(snapshot);
      const activeWorkflows = workflows
        .filter(workflow => deriveWorkflowStatus(workflow, (id) => byId.get(id)) === 'active')
        .length;

      return {
        systemStatus: 'healthy',
        activeWorkflows,
        totalWorkflows: workflows.length,
        totalTasks,
        pendingTasks: counts.pending,
        inProgressTasks: counts.in_progress,
        completedTasks: counts.completed,
        blockedTasks: counts.blocked,
        progressPercentage: totalTasks > 0 ? (counts.completed / totalTasks) * 100 : 0,
        nextTasks: selectEligible(snapshot).slice(0, STATUS_PREVIEW_TASKS)
      };
    });
  }
}
