import { InMemoryEventBus } from '../../src/infrastructure/events/InMemoryEventBus';
import { ILogger } from '../../src/domain/common/ILogger';
import { createMockLogger } from '../helpers';

describe('InMemoryEventBus', () => {
  let logger: jest.Mocked<ILogger>;
  let bus: InMemoryEventBus;

  const payload = { workflowId: 'wf_1', type: 'pipeline' };

  beforeEach(() => {
    logger = createMockLogger();
    bus = new InMemoryEventBus(logger);
  });

  it('delivers events to every handler', async () => {
    const first = jest.fn();
    const second = jest.fn();
    bus.on('workflow:completed', first);
    bus.on('workflow:completed', second);

    await bus.emit('workflow:completed', payload);

    expect(first).toHaveBeenCalledWith(payload);
    expect(second).toHaveBeenCalledWith(payload);
  });

  it('waits for async handlers', async () => {
    const seen: string[] = [];
    bus.on('workflow:completed', async (data) => {
      await new Promise(resolve => setTimeout(resolve, 5));
      seen.push(data.workflowId);
    });

    await bus.emit('workflow:completed', payload);

    expect(seen).toEqual(['wf_1']);
  });

  it('logs a failing handler without affecting the others', async () => {
    const healthy = jest.fn();
    bus.on('workflow:completed', () => {
      throw new Error('boom');
    });
    bus.on('workflow:completed', healthy);

    await expect(bus.emit('workflow:completed', payload)).resolves.toBeUndefined();

    expect(healthy).toHaveBeenCalled();
    expect(logger.error).toHaveBeenCalledWith('Error in event handler for workflow:completed:', expect.any(Error));
  });

  it('runs a once handler on the first emit only', async () => {
    const seen: string[] = [];
    bus.once('workflow:completed', async (data) => {
      await new Promise(resolve => setTimeout(resolve, 5));
      seen.push(data.workflowId);
    });

    await bus.emit('workflow:completed', payload);
    expect(seen).toEqual(['wf_1']);

    await bus.emit('workflow:completed', { workflowId: 'wf_2', type: 'pipeline' });
    expect(seen).toEqual(['wf_1']);
    expect(bus.listenerCount('workflow:completed')).toBe(0);
  });

  it('supports once, off and removeAllListeners', async () => {
    const once = jest.fn();
    const removed = jest.fn();
    bus.once('workflow:completed', once);
    bus.on('workflow:completed', removed);
    bus.off('workflow:completed', removed);

    await bus.emit('workflow:completed', payload);
    await bus.emit('workflow:completed', payload);

    expect(once).toHaveBeenCalledTimes(1);
    expect(removed).not.toHaveBeenCalled();

    bus.on('task:created', jest.fn());
    bus.removeAllListeners();
    expect(bus.listenerCount('task:created')).toBe(0);
  });
});
