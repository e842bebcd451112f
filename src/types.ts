// JSON values carried in caller-supplied context
export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/** Free-form context supplied when a workflow is created. Key order is preserved. */
export type ProjectContext = { [key: string]: JsonValue };

// Supporting types
export type TaskStatus = 'pending' | 'in_progress' | 'completed' | 'blocked';
export type TaskPriority = 'high' | 'medium' | 'low';
export type WorkflowStatus = 'active' | 'completed';

export interface TaskMetadata {
  workflowId?: string;
  workflowType?: string;
  projectContext: ProjectContext;
}

// Base types
export interface Task {
  id: string;
  description: string;
  agent: string;
  status: TaskStatus;
  dependencies: readonly string[];
  priority: TaskPriority;
  output: string | null;
  artifacts: readonly string[];
  metadata: TaskMetadata;
  createdAt: number;
  startedAt: number | null;
  completedAt: number | null;
  estimatedDuration: number | null;   // advisory minutes
}

export interface Workflow {
  id: string;
  type: string;
  description: string;
  taskIds: readonly string[];
  createdAt: number;
  projectContext: ProjectContext;
}

/** Workflow as returned to readers, with its status derived from member tasks. */
export interface WorkflowView extends Workflow {
  status: WorkflowStatus;
}

export interface WorkflowProgress {
  workflowId: string | null;
  total: number;
  completed: number;
  percentage: number;
}

export interface WorkflowDetails extends WorkflowView {
  tasks: Task[];
  progress: WorkflowProgress;
}

// Catalog types
export interface AgentCapability {
  name: string;
  role: string;
  expertise: string[];
  handoffTargets: string[];
  constraints: string[];
  tools: string[];
  outputFormat: string;
  baseDuration?: number;              // minutes
}

export interface WorkflowTemplate {
  id: string;
  description: string;
  agents: string[];
  complexityMultiplier?: number;
}

// Payload types
export interface CreateWorkflowPayload {
  type: string;
  description: string;
  projectContext?: ProjectContext;
}

export interface CreateWorkflowResult {
  workflowId: string;
  taskIds: string[];
  nextTask: Task | null;
}

export interface CreateTaskPayload {
  description: string;
  agent: string;
  dependencies?: string[];
  priority?: TaskPriority;
  projectContext?: ProjectContext;
}

export interface CompleteTaskPayload {
  output: string;
  artifacts?: string[];
  nextAgentHint?: string;
}

export interface TaskCompletion {
  output: string;
  artifacts: string[];
}

export interface CompleteTaskResult {
  completedTask: Task;
  nextTasks: Task[];
  workflowProgress: WorkflowProgress;
}

export interface AgentResponsePayload {
  analysis: string;
  recommendation: string;
  nextSteps: string;
  handoff?: string;
  artifacts?: string[];
}

export interface SystemStatus {
  systemStatus: 'healthy';
  activeWorkflows: number;
  totalWorkflows: number;
  totalTasks: number;
  pendingTasks: number;
  inProgressTasks: number;
  completedTasks: number;
  blockedTasks: number;
  progressPercentage: number;
  nextTasks: Task[];
}
