import express, { Request, Response } from 'express';
import { AgentService } from '../application/services/AgentService';
import { ILogger } from '../domain/common/ILogger';
import { handleError } from './errors';
import { agentNameParamSchema, agentResponseSchema, parseRequest } from './validation';

/**
 * Create agent registry routes.
 */
export function createAgentRoutes(agentService: AgentService, logger?: ILogger) {
  const router = express.Router();

  router.get('/agents', (_req: Request, res: Response) => {
    res.json(agentService.listAgents());
  });

  router.get('/agents/:name', (req: Request, res: Response) => {
    try {
      const { name } = parseRequest(agentNameParamSchema, req.params, 'params');
      res.json(agentService.getAgent(name));
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  // External agents report their analysis back here
  router.post('/agents/:name/response', async (req: Request, res: Response) => {
    try {
      const { name } = parseRequest(agentNameParamSchema, req.params, 'params');
      const response = parseRequest(agentResponseSchema, req.body, 'body');
      const result = await agentService.logAgentResponse(name, response);
      res.json(result);
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  return router;
}
