import { InMemoryWorkflowRepository } from '../../src/infrastructure/repositories/InMemoryWorkflowRepository';
import { ConflictError } from '../../src/domain/common/Errors';
import { Workflow } from '../../src/types';
import { createMockLogger } from '../helpers';

function createTestWorkflow(overrides: Partial<Workflow> = {}): Workflow {
  return {
    id: 'wf_1',
    type: 'pipeline',
    description: 'Ship it',
    taskIds: ['t1', 't2'],
    createdAt: 1000,
    projectContext: { repo: 'demo' },
    ...overrides,
  };
}

describe('InMemoryWorkflowRepository', () => {
  let repo: InMemoryWorkflowRepository;

  beforeEach(() => {
    repo = new InMemoryWorkflowRepository(createMockLogger());
  });

  it('stores and finds a workflow', async () => {
    const created = await repo.create(createTestWorkflow());

    expect(created).toEqual(createTestWorkflow());
    expect(Object.isFrozen(created.taskIds)).toBe(true);
    expect(await repo.findById('wf_1')).toBe(created);
  });

  it('deep-copies the project context', async () => {
    const projectContext = { repo: 'web', nested: { env: 'prod' } };
    const created = await repo.create(createTestWorkflow({ projectContext }));

    projectContext.nested.env = 'dev';

    expect(created.projectContext).toEqual({ repo: 'web', nested: { env: 'prod' } });
    expect(Object.isFrozen(created.projectContext.nested)).toBe(true);
  });

  it('returns null for an unknown id', async () => {
    expect(await repo.findById('wf_missing')).toBeNull();
  });

  it('rejects a duplicate id', async () => {
    await repo.create(createTestWorkflow());
    await expect(repo.create(createTestWorkflow({ description: 'Again' }))).rejects.toThrow(ConflictError);
    expect((await repo.findById('wf_1'))?.description).toBe('Ship it');
  });

  it('lists workflows in creation order', async () => {
    await repo.create(createTestWorkflow({ id: 'wf_b' }));
    await repo.create(createTestWorkflow({ id: 'wf_a' }));

    expect((await repo.findAll()).map(w => w.id)).toEqual(['wf_b', 'wf_a']);
    expect(await repo.count()).toBe(2);
  });
});
