import { Request, Response, NextFunction } from 'express';
import { CoreError, ValidationFailedError } from '../utils/errors';
import { logger } from '../utils/logger';

const statusOf = (err: unknown): number =>
  typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number'
    ? err.status
    : 500;

export const errorMiddleware = (
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
) => {
  logger.error('Error:', err);

  if (res.headersSent) {
    return next(err);
  }

  if (err instanceof CoreError) {
    return res.status(err.status).json({
      success: false,
      error: err.message,
      kind: err.kind,
      ...(err instanceof ValidationFailedError && { details: err.errors }),
    });
  }

  const status = statusOf(err);
  const message = err instanceof Error && status < 500 ? err.message : 'Internal server error';

  res.status(status).json({
    success: false,
    error: message,
    ...(process.env.NODE_ENV === 'development' && err instanceof Error && { stack: err.stack }),
  });
};
