import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { Task } from '../src/types';
import { ILogger } from '../src/domain/common/ILogger';
import { IIdGenerator } from '../src/domain/common/IIdGenerator';
import { StaticCatalog } from '../src/infrastructure/catalog/StaticCatalog';
import { Config } from '../src/infrastructure/config';
import { createContainer, Container } from '../src/container';

/**
 * Test helper utilities
 */

export class TestDataDir {
  private testDir: string;

  constructor() {
    // Use a unique test directory for each test run
    this.testDir = path.join(os.tmpdir(), `orchestrator-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  }

  getPath(): string {
    return this.testDir;
  }

  async write(fileName: string, content: string): Promise<void> {
    await fs.mkdir(this.testDir, { recursive: true });
    await fs.writeFile(path.join(this.testDir, fileName), content, 'utf-8');
  }

  async cleanup(): Promise<void> {
    await fs.rm(this.testDir, { recursive: true, force: true });
  }
}

/**
 * Wait for a condition to be true
 */
export async function waitFor(
  condition: () => boolean | Promise<boolean>,
  timeout: number = 5000,
  interval: number = 20
): Promise<void> {
  const startTime = Date.now();

  while (Date.now() - startTime < timeout) {
    if (await condition()) {
      return;
    }
    await new Promise(resolve => setTimeout(resolve, interval));
  }

  throw new Error(`Timeout waiting for condition after ${timeout}ms`);
}

export function createMockLogger(): jest.Mocked<ILogger> {
  return {
    error: jest.fn(),
    warn: jest.fn(),
    info: jest.fn(),
    debug: jest.fn(),
  };
}

/**
 * Ids of the form `${prefix}_${n}`, numbered from 1 in call order.
 */
export class SequentialIdGenerator implements IIdGenerator {
  private counter = 0;

  generate(prefix: string): string {
    this.counter++;
    return `${prefix}_${this.counter}`;
  }
}

/**
 * Three agents and two templates:
 * - `pipeline`: alpha -> beta -> gamma, multiplier 2
 * - `solo`: beta only, no multiplier
 */
export function createTestCatalog(): StaticCatalog {
  return new StaticCatalog({
    agents: [
      { name: 'alpha', role: 'Planner', expertise: ['planning'], handoffTargets: ['beta'], constraints: [], tools: [], outputFormat: 'plan', baseDuration: 10 },
      { name: 'beta', role: 'Builder', expertise: ['building'], handoffTargets: ['gamma'], constraints: [], tools: [], outputFormat: 'code', baseDuration: 25 },
      { name: 'gamma', role: 'Checker', expertise: ['checking'], handoffTargets: [], constraints: [], tools: [], outputFormat: 'report' },
    ],
    templates: [
      { id: 'pipeline', description: 'Plan, build, check', agents: ['alpha', 'beta', 'gamma'], complexityMultiplier: 2 },
      { id: 'solo', description: 'Build only', agents: ['beta'] },
    ],
  });
}

/**
 * Create test task data
 */
export function createTestTask(overrides: Partial<Task> = {}): Task {
  return {
    id: 'task_1',
    description: 'Test task',
    agent: 'alpha',
    status: 'pending',
    dependencies: [],
    priority: 'medium',
    output: null,
    artifacts: [],
    metadata: { projectContext: {} },
    createdAt: 1000,
    startedAt: null,
    completedAt: null,
    estimatedDuration: 30,
    ...overrides,
  };
}

/**
 * Container over the shipped catalog with a silent logger and sequential ids.
 */
export async function createTestContainer(): Promise<Container> {
  return createContainer({
    config: Config.fromObject({ nodeEnv: 'test' }),
    logger: createMockLogger(),
    idGenerator: new SequentialIdGenerator(),
  });
}
