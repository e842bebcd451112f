import express, { Request, Response } from 'express';
import { TaskService } from '../application/services/TaskService';
import { ILogger } from '../domain/common/ILogger';
import { handleError } from './errors';
import { completeTaskSchema, createTaskSchema, idParamSchema, parseRequest } from './validation';

/**
 * Create task routes using the TaskService.
 */
export function createTaskRoutes(taskService: TaskService, logger?: ILogger) {
  const router = express.Router();

  // Create standalone task
  router.post('/tasks', async (req: Request, res: Response) => {
    try {
      const input = parseRequest(createTaskSchema, req.body, 'body');
      const task = await taskService.createTask(input);
      res.status(201).json(task);
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  // Eligible tasks across all workflows; registered before /tasks/:id
  router.get('/tasks/next', async (_req: Request, res: Response) => {
    try {
      const tasks = await taskService.listEligibleTasks();
      res.json(tasks);
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  // Get task by ID
  router.get('/tasks/:id', async (req: Request, res: Response) => {
    try {
      const { id } = parseRequest(idParamSchema, req.params, 'params');
      const task = await taskService.getTask(id);
      res.json(task);
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  // Start task
  router.post('/tasks/:id/start', async (req: Request, res: Response) => {
    try {
      const { id } = parseRequest(idParamSchema, req.params, 'params');
      const task = await taskService.startTask(id);
      res.json(task);
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  // Complete task
  router.post('/tasks/:id/complete', async (req: Request, res: Response) => {
    try {
      const { id } = parseRequest(idParamSchema, req.params, 'params');
      const input = parseRequest(completeTaskSchema, req.body, 'body');
      const result = await taskService.completeTask(id, input);
      res.json(result);
    } catch (err) {
      handleError(err, res, logger);
    }
  });

  return router;
}
