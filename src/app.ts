import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { Container } from './container';
import { createWorkflowRoutes } from './api/workflowRoutes';
import { createTaskRoutes } from './api/taskRoutes';
import { createAgentRoutes } from './api/agentRoutes';
import { createStatusRoutes } from './api/statusRoutes';
import { createTemplateRoutes } from './api/templateRoutes';
import { handleError } from './api/errors';
import { ValidationError } from './domain/common/Errors';

/**
 * Build the Express application over a wired container.
 */
export function createApp(container: Container): express.Express {
  const { config, logger, workflowService, taskService, agentService, statusService } = container;

  const app = express();

  if (config.cors.enabled) {
    app.use(cors({
      origin: config.cors.origins.includes('*') ? true : config.cors.origins,
      credentials: config.cors.credentials,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With']
    }));
  }
  app.use(express.json({ limit: '1mb' }));

  app.get('/', (_req: Request, res: Response) => {
    res.json(statusService.getServiceInfo());
  });

  // Health check
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: Date.now(),
      uptime: process.uptime()
    });
  });

  app.use('/api', createWorkflowRoutes(workflowService, logger));
  app.use('/api', createTaskRoutes(taskService, logger));
  app.use('/api', createAgentRoutes(agentService, logger));
  app.use('/api', createStatusRoutes(statusService, logger));
  app.use('/api/templates', createTemplateRoutes(workflowService));

  // Global error handling middleware
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    // express.json() rejects malformed bodies with a SyntaxError
    if (err instanceof SyntaxError) {
      handleError(new ValidationError('Malformed JSON body'), res);
      return;
    }
    handleError(err, res, logger);
  });

  return app;
}
