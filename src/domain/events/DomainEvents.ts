import { Task, WorkflowView } from '../../types';

/**
 * Type-safe domain event definitions.
 */

// Workflow Events
export interface WorkflowCreatedEvent {
  type: 'workflow:created';
  data: WorkflowView;
}

export interface WorkflowCompletedEvent {
  type: 'workflow:completed';
  data: { workflowId: string; type: string };
}

// Task Events
export interface TaskCreatedEvent {
  type: 'task:created';
  data: Task;
}

export interface TaskStartedEvent {
  type: 'task:started';
  data: Task;
}

export interface TaskCompletedEvent {
  type: 'task:completed';
  data: Task;
}

// Agent Events
export interface AgentResponseLoggedEvent {
  type: 'agent:response_logged';
  data: { agent: string; analysis: string; handoff?: string };
}

/**
 * Union type of all domain events.
 * Use this for type-safe event handling.
 */
export type DomainEvent =
  | WorkflowCreatedEvent
  | WorkflowCompletedEvent
  | TaskCreatedEvent
  | TaskStartedEvent
  | TaskCompletedEvent
  | AgentResponseLoggedEvent;

/**
 * Type-safe event map for event bus.
 * Maps event name strings to their payload types.
 */
export interface TypedEventMap {
  'workflow:created': WorkflowView;
  'workflow:completed': { workflowId: string; type: string };
  'task:created': Task;
  'task:started': Task;
  'task:completed': Task;
  'agent:response_logged': { agent: string; analysis: string; handoff?: string };
}

/**
 * All valid event names.
 */
export type EventName = keyof TypedEventMap;

/**
 * Get the payload type for a specific event name.
 */
export type EventPayload<K extends EventName> = TypedEventMap[K];
