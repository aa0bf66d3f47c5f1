import { Request, Response, NextFunction } from 'express';
import { AppError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger({ service: 'ErrorHandler' });

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const status = err instanceof AppError ? err.statusCode : 500;
  const expose = err instanceof AppError && err.expose;

  const context = {
    error: err.message,
    path: req.path,
    method: req.method,
    status
  };
  if (status >= 500) {
    logger.error({ ...context, stack: err.stack }, 'Unhandled error');
  } else {
    logger.warn(context, 'Request rejected');
  }

  // Streaming responses may already be under way
  if (res.headersSent) {
    res.end();
    return;
  }

  res.status(status).json({
    error: expose ? err.name : 'Internal server error',
    message: expose ? err.message : 'Something went wrong'
  });
}
