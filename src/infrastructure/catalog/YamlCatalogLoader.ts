import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import { z } from 'zod';
import { ICatalog, ICatalogLoader } from '../../domain/catalog/ICatalog';
import { ILogger } from '../../domain/common/ILogger';
import { ConfigError } from '../../domain/common/Errors';
import { StaticCatalog } from './StaticCatalog';

export const AGENTS_FILE = 'agents.yaml';
export const WORKFLOWS_FILE = 'workflows.yaml';

const agentSchema = z.object({
  name: z.string().min(1),
  role: z.string().min(1),
  expertise: z.array(z.string()).default([]),
  handoffTargets: z.array(z.string()).default([]),
  constraints: z.array(z.string()).default([]),
  tools: z.array(z.string()).default([]),
  outputFormat: z.string().default(''),
  baseDuration: z.number().int().positive().optional(),
}).strict();

const templateSchema = z.object({
  id: z.string().min(1),
  description: z.string().default(''),
  agents: z.array(z.string().min(1)).min(1),
  complexityMultiplier: z.number().positive().optional(),
}).strict();

const agentsFileSchema = z.object({ agents: z.array(agentSchema) }).strict();
const workflowsFileSchema = z.object({ workflows: z.array(templateSchema) }).strict();

/**
 * Loads the agent registry and workflow templates from YAML files in a directory.
 */
export class YamlCatalogLoader implements ICatalogLoader {
  constructor(
    private catalogDir: string,
    private logger: ILogger
  ) {}

  async load(): Promise<ICatalog> {
    const agentsDoc = await this.readYaml(AGENTS_FILE);
    const workflowsDoc = await this.readYaml(WORKFLOWS_FILE);

    const agents = agentsFileSchema.safeParse(agentsDoc);
    if (!agents.success) {
      throw new ConfigError(`Invalid ${AGENTS_FILE}`, this.describeIssues(agents.error));
    }
    const workflows = workflowsFileSchema.safeParse(workflowsDoc);
    if (!workflows.success) {
      throw new ConfigError(`Invalid ${WORKFLOWS_FILE}`, this.describeIssues(workflows.error));
    }

    const catalog = new StaticCatalog({
      agents: agents.data.agents,
      templates: workflows.data.workflows
    });

    this.logger.info(
      `Loaded catalog: ${agents.data.agents.length} agents, ${workflows.data.workflows.length} workflow templates`
    );
    return catalog;
  }

  private async readYaml(fileName: string): Promise<unknown> {
    const filePath = path.join(this.catalogDir, fileName);

    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      throw new ConfigError(`Cannot read catalog file: ${filePath}`, {
        error: err instanceof Error ? err.message : String(err)
      });
    }

    try {
      return yaml.parse(content);
    } catch (err) {
      throw new ConfigError(`Cannot parse catalog file: ${filePath}`, {
        error: err instanceof Error ? err.message : String(err)
      });
    }
  }

  private describeIssues(error: z.ZodError): Array<{ path: string; message: string }> {
    return error.issues.map(i => ({
      path: i.path.join('.'),
      message: i.message,
    }));
  }
}
