import { AgentCapability, WorkflowTemplate } from '../../types';
import { ICatalog } from '../../domain/catalog/ICatalog';
import { ConfigError } from '../../domain/common/Errors';

export interface CatalogData {
  agents: AgentCapability[];
  templates: WorkflowTemplate[];
}

/**
 * Immutable catalog built from already-parsed data.
 * Every agent a template names must exist in the registry.
 */
export class StaticCatalog implements ICatalog {
  private readonly agents: ReadonlyMap<string, AgentCapability>;
  private readonly templates: ReadonlyMap<string, WorkflowTemplate>;

  constructor(data: CatalogData) {
    const agents = new Map<string, AgentCapability>();
    for (const agent of data.agents) {
      if (agents.has(agent.name)) {
        throw new ConfigError(`Duplicate agent in catalog: ${agent.name}`);
      }
      agents.set(agent.name, Object.freeze({ ...agent }));
    }

    const templates = new Map<string, WorkflowTemplate>();
    for (const template of data.templates) {
      if (templates.has(template.id)) {
        throw new ConfigError(`Duplicate workflow template in catalog: ${template.id}`);
      }
      if (template.agents.length === 0) {
        throw new ConfigError(`Workflow template '${template.id}' has no agents`);
      }
      const unknown = template.agents.filter(name => !agents.has(name));
      if (unknown.length > 0) {
        throw new ConfigError(`Workflow template '${template.id}' references unknown agents`, { unknown });
      }
      templates.set(template.id, Object.freeze({ ...template, agents: [...template.agents] }));
    }

    this.agents = agents;
    this.templates = templates;
  }

  getAgent(name: string): AgentCapability | null {
    return this.agents.get(name) ?? null;
  }

  listAgents(): AgentCapability[] {
    return Array.from(this.agents.values());
  }

  getTemplate(type: string): WorkflowTemplate | null {
    return this.templates.get(type) ?? null;
  }

  listTemplates(): WorkflowTemplate[] {
    return Array.from(this.templates.values());
  }
}
