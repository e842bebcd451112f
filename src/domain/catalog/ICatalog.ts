import { AgentCapability, WorkflowTemplate } from '../../types';

/**
 * Read-only reference data: the agent capability registry and the
 * workflow template catalog. Loaded once at startup and never mutated.
 */
export interface ICatalog {
  getAgent(name: string): AgentCapability | null;

  listAgents(): AgentCapability[];

  getTemplate(type: string): WorkflowTemplate | null;

  listTemplates(): WorkflowTemplate[];
}

/**
 * Loads the catalog from its backing source.
 */
export interface ICatalogLoader {
  /**
   * @throws {ConfigError} if the source is missing or malformed
   */
  load(): Promise<ICatalog>;
}
