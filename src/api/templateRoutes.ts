import { Router, Request, Response } from 'express';
import { WorkflowService } from '../application/services/WorkflowService';
import { handleError } from './errors';
import { idParamSchema, parseRequest } from './validation';

/**
 * Create workflow template routes.
 */
export function createTemplateRoutes(workflowService: WorkflowService): Router {
  const router = Router();

  // GET /api/templates - list all templates
  router.get('/', (_req: Request, res: Response) => {
    res.json(workflowService.listTemplates());
  });

  // GET /api/templates/:id - get specific template
  router.get('/:id', (req: Request, res: Response) => {
    try {
      const { id } = parseRequest(idParamSchema, req.params, 'params');
      res.json(workflowService.getTemplate(id));
    } catch (err) {
      handleError(err, res);
    }
  });

  return router;
}
