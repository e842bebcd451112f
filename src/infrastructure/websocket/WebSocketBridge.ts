import { WebSocketServer, WebSocket, RawData } from 'ws';
import { IEventBus } from '../../domain/events/IEventBus';
import { ILogger } from '../../domain/common/ILogger';
import { DomainEvent } from '../../domain/events/DomainEvents';

type ClientMessage =
  | { type: 'ping' }
  | { type: 'subscribe'; workflowIds: string[] }
  | { type: 'unsubscribe' }
  | { type: 'other'; name: string };

function parseClientMessage(data: RawData): ClientMessage | null {
  let message: unknown;
  try {
    message = JSON.parse(data.toString());
  } catch {
    return null;
  }
  if (typeof message !== 'object' || message === null || !('type' in message)) {
    return null;
  }

  const { type } = message;
  if (type === 'ping') return { type: 'ping' };
  if (type === 'unsubscribe') return { type: 'unsubscribe' };
  if (type === 'subscribe' && 'workflowIds' in message && Array.isArray(message.workflowIds)) {
    const workflowIds = message.workflowIds.filter((id: unknown): id is string => typeof id === 'string');
    return { type: 'subscribe', workflowIds };
  }
  return { type: 'other', name: String(type) };
}

/**
 * The workflow an event belongs to, if any. Standalone tasks and agent
 * events are not workflow-scoped.
 */
export function workflowIdOf(event: DomainEvent): string | undefined {
  switch (event.type) {
    case 'workflow:created':
      return event.data.id;
    case 'workflow:completed':
      return event.data.workflowId;
    case 'task:created':
    case 'task:started':
    case 'task:completed':
      return event.data.metadata.workflowId;
    case 'agent:response_logged':
      return undefined;
  }
}

/**
 * Bridges domain events to WebSocket clients.
 *
 * Clients can send a `subscribe` message with `workflowIds` to receive only
 * workflow-scoped events for those workflows. Clients without a subscription
 * receive all events.
 */
export class WebSocketBridge {
  /** Per-client workflow filters. Clients not in this map get all events. */
  private subscriptions = new Map<WebSocket, Set<string>>();

  constructor(
    private wss: WebSocketServer,
    private eventBus: IEventBus,
    private logger: ILogger
  ) {
    this.setupEventHandlers();
    this.setupConnectionHandlers();
  }

  private setupConnectionHandlers(): void {
    this.wss.on('connection', (ws: WebSocket) => {
      ws.on('close', () => {
        this.subscriptions.delete(ws);
      });

      ws.on('error', (error) => {
        this.logger.error('WebSocket client error:', error);
      });

      ws.on('message', (data) => {
        const message = parseClientMessage(data);
        if (!message) {
          this.logger.warn('Failed to parse WebSocket message');
          return;
        }
        this.handleClientMessage(ws, message);
      });
    });
  }

  private handleClientMessage(ws: WebSocket, message: ClientMessage): void {
    switch (message.type) {
      case 'ping':
        ws.send(JSON.stringify({ type: 'pong', timestamp: Date.now() }));
        return;
      case 'subscribe': {
        const ids = new Set(message.workflowIds);
        this.subscriptions.set(ws, ids);
        ws.send(JSON.stringify({ type: 'subscribed', workflowIds: [...ids], timestamp: Date.now() }));
        return;
      }
      case 'unsubscribe':
        this.subscriptions.delete(ws);
        ws.send(JSON.stringify({ type: 'unsubscribed', timestamp: Date.now() }));
        return;
      case 'other':
        this.logger.debug('Received WebSocket message', { type: message.name });
        return;
    }
  }

  private setupEventHandlers(): void {
    this.eventBus.on('workflow:created', (data) => this.broadcast({ type: 'workflow:created', data }));
    this.eventBus.on('workflow:completed', (data) => this.broadcast({ type: 'workflow:completed', data }));
    this.eventBus.on('task:created', (data) => this.broadcast({ type: 'task:created', data }));
    this.eventBus.on('task:started', (data) => this.broadcast({ type: 'task:started', data }));
    this.eventBus.on('task:completed', (data) => this.broadcast({ type: 'task:completed', data }));
    this.eventBus.on('agent:response_logged', (data) => this.broadcast({ type: 'agent:response_logged', data }));

    this.logger.info('WebSocket bridge subscribed to domain events');
  }

  /**
   * Broadcast an event to connected clients.
   * Subscribed clients only receive workflow-scoped events for their workflows.
   */
  private broadcast(event: DomainEvent): void {
    const message = JSON.stringify({
      type: event.type,
      event: event.type,
      data: event.data,
      timestamp: Date.now()
    });

    const workflowId = workflowIdOf(event);

    this.wss.clients.forEach((client) => {
      if (client.readyState !== WebSocket.OPEN) return;

      const sub = this.subscriptions.get(client);
      if (sub && workflowId && !sub.has(workflowId)) {
        return;
      }

      client.send(message);
    });
  }

  getClientCount(): number {
    return this.wss.clients.size;
  }
}
