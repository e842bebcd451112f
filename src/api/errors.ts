import { Response } from 'express';
import { AppError } from '../domain/common/Errors';
import { ILogger } from '../domain/common/ILogger';

/**
 * Send an error response. Application errors keep their status and code;
 * anything else becomes a 500.
 */
export function handleError(err: unknown, res: Response, logger?: ILogger): void {
  if (err instanceof AppError) {
    res.status(err.statusCode).json(err.toJSON());
    return;
  }

  const error = err instanceof Error ? err : new Error(String(err));
  logger?.error('Unhandled request error:', error);
  res.status(500).json({
    error: true,
    statusCode: 500,
    code: 'INTERNAL_ERROR',
    message: error.message
  });
}
