import express, { Request, Response } from 'express';
import { StatusService } from '../application/services/StatusService';
import { ILogger } from '../domain/common/ILogger';
import { handleError } from './errors';

/**
 * Create system status routes.
 */
export function createStatusRoutes(statusService: StatusService, logger?: ILogger) {
  const router = express.Router();

  router.get('/status', async (_req: Request, res: Response) => {
    try {
      const status = await statusService.getSystemStatus();
      res.json(status);
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  return router;
}
