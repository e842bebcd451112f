import express, { Request, Response } from 'express';
import { WorkflowService } from '../application/services/WorkflowService';
import { ILogger } from '../domain/common/ILogger';
import { handleError } from './errors';
import { createWorkflowSchema, idParamSchema, parseRequest } from './validation';

/**
 * Create workflow routes using the WorkflowService.
 */
export function createWorkflowRoutes(workflowService: WorkflowService, logger?: ILogger) {
  const router = express.Router();

  // Create workflow from a template
  router.post('/workflows', async (req: Request, res: Response) => {
    try {
      const input = parseRequest(createWorkflowSchema, req.body, 'body');
      const result = await workflowService.createWorkflow(input);
      res.status(201).json(result);
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  // List workflows
  router.get('/workflows', async (_req: Request, res: Response) => {
    try {
      const workflows = await workflowService.listWorkflows();
      res.json(workflows);
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  // Get workflow with tasks and progress
  router.get('/workflows/:id', async (req: Request, res: Response) => {
    try {
      const { id } = parseRequest(idParamSchema, req.params, 'params');
      const workflow = await workflowService.getWorkflow(id);
      res.json(workflow);
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  // Progress never 404s: unknown workflows report zero
  router.get('/workflows/:id/progress', async (req: Request, res: Response) => {
    try {
      const { id } = parseRequest(idParamSchema, req.params, 'params');
      const progress = await workflowService.getProgress(id);
      res.json(progress);
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  return router;
}
