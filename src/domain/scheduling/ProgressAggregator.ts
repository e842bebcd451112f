import { Workflow, WorkflowProgress, WorkflowStatus } from '../../types';
import { TaskLookup } from './Scheduler';

/**
 * Completion progress of one workflow, computed from live task state.
 * A missing workflow yields an all-zero result rather than an error.
 */
export function aggregateProgress(
  workflowId: string | null,
  workflow: Workflow | null,
  lookup: TaskLookup
): WorkflowProgress {
  if (!workflow) {
    return { workflowId, total: 0, completed: 0, percentage: 0 };
  }

  const total = workflow.taskIds.length;
  const completed = workflow.taskIds
    .filter(taskId => lookup(taskId)?.status === 'completed')
    .length;

  return {
    workflowId: workflow.id,
    total,
    completed,
    percentage: total > 0 ? (completed / total) * 100 : 0
  };
}

/**
 * A workflow is completed iff every member task is completed.
 */
export function deriveWorkflowStatus(workflow: Workflow, lookup: TaskLookup): WorkflowStatus {
  const done = workflow.taskIds.every(taskId => lookup(taskId)?.status === 'completed');
  return done ? 'completed' : 'active';
}
