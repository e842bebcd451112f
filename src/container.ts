import { Config } from './infrastructure/config';
import { ConsoleLogger } from './infrastructure/common/ConsoleLogger';
import { RandomIdGenerator } from './infrastructure/common/RandomIdGenerator';
import { InMemoryEventBus } from './infrastructure/events/InMemoryEventBus';
import { InMemoryTaskRepository } from './infrastructure/repositories/InMemoryTaskRepository';
import { InMemoryWorkflowRepository } from './infrastructure/repositories/InMemoryWorkflowRepository';
import { YamlCatalogLoader } from './infrastructure/catalog/YamlCatalogLoader';
import { WorkflowService } from './application/services/WorkflowService';
import { TaskService } from './application/services/TaskService';
import { AgentService } from './application/services/AgentService';
import { StatusService } from './application/services/StatusService';
import { ILogger } from './domain/common/ILogger';
import { IIdGenerator } from './domain/common/IIdGenerator';
import { Mutex } from './domain/common/Mutex';
import { IEventBus } from './domain/events/IEventBus';
import { ICatalog } from './domain/catalog/ICatalog';
import { ITaskRepository } from './domain/repositories/ITaskRepository';
import { IWorkflowRepository } from './domain/repositories/IWorkflowRepository';

/**
 * Dependency injection container.
 * Wires together all application components.
 */
export interface Container {
  // Configuration
  config: Config;
  catalog: ICatalog;

  // Infrastructure
  logger: ILogger;
  idGenerator: IIdGenerator;
  eventBus: IEventBus;
  storeLock: Mutex;

  // Repositories
  taskRepo: ITaskRepository;
  workflowRepo: IWorkflowRepository;

  // Services
  workflowService: WorkflowService;
  taskService: TaskService;
  agentService: AgentService;
  statusService: StatusService;

  // Lifecycle
  shutdown(): Promise<void>;
}

/**
 * Pieces a caller can supply instead of the defaults (tests pass synthetic
 * catalogs and quiet loggers).
 */
export interface ContainerOverrides {
  config?: Config;
  catalog?: ICatalog;
  logger?: ILogger;
  idGenerator?: IIdGenerator;
}

/**
 * Create and wire up all dependencies.
 */
export async function createContainer(overrides: ContainerOverrides = {}): Promise<Container> {
  // 1. Configuration
  const config = overrides.config ?? new Config();

  // 2. Infrastructure - Core
  const logger = overrides.logger ?? new ConsoleLogger(config.log.level, {}, config.log.format);
  const idGenerator = overrides.idGenerator ?? new RandomIdGenerator();
  const eventBus = new InMemoryEventBus(logger);
  const storeLock = new Mutex();

  // 3. Reference data
  const catalog = overrides.catalog ?? await new YamlCatalogLoader(config.catalogDir, logger).load();

  // 4. Repositories
  const taskRepo = new InMemoryTaskRepository(logger);
  const workflowRepo = new InMemoryWorkflowRepository(logger);

  // 5. Services
  const workflowService = new WorkflowService(taskRepo, workflowRepo, catalog, eventBus, idGenerator, storeLock, logger);
  const taskService = new TaskService(taskRepo, workflowRepo, catalog, eventBus, idGenerator, storeLock, logger);
  const agentService = new AgentService(catalog, eventBus, logger);
  const statusService = new StatusService(taskRepo, workflowRepo, catalog, storeLock);

  return {
    config,
    catalog,
    logger,
    idGenerator,
    eventBus,
    storeLock,
    taskRepo,
    workflowRepo,
    workflowService,
    taskService,
    agentService,
    statusService,

    async shutdown() {
      logger.info('Shutting down container...');
      eventBus.removeAllListeners();
      logger.info('Container shutdown complete');
    }
  };
}
