import { AgentCapability, AgentResponsePayload } from '../../types';
import { ICatalog } from '../../domain/catalog/ICatalog';
import { IEventBus } from '../../domain/events/IEventBus';
import { ILogger } from '../../domain/common/ILogger';
import { NotFoundError } from '../../domain/common/Errors';

const ANALYSIS_PREVIEW_LENGTH = 100;

/**
 * Read access to the agent capability registry, plus response logging for
 * external agents reporting back.
 */
export class AgentService {
  constructor(
    private catalog: ICatalog,
    private eventBus: IEventBus,
    private logger: ILogger
  ) {}

  listAgents(): AgentCapability[] {
    return this.catalog.listAgents();
  }

  getAgent(name: string): AgentCapability {
    const agent = this.catalog.getAgent(name);
    if (!agent) {
      throw new NotFoundError('Agent', name);
    }
    return agent;
  }

  /**
   * Record an agent's response. Nothing is stored; the response is logged and
   * published for listeners.
   */
  async logAgentResponse(name: string, response: AgentResponsePayload): Promise<{ logged: true; agent: string }> {
    const agent = this.getAgent(name);

    const preview = response.analysis.length > ANALYSIS_PREVIEW_LENGTH
      ? `${response.analysis.slice(0, ANALYSIS_PREVIEW_LENGTH)}...`
      : response.analysis;
    this.logger.info(`Agent ${agent.name} response logged: ${preview}`, {
      handoff: response.handoff,
      artifacts: response.artifacts?.length ?? 0
    });

    await this.eventBus.emit('agent:response_logged', {
      agent: agent.name,
      analysis: response.analysis,
      handoff: response.handoff
    });

    return { logged: true, agent: agent.name };
  }
}
