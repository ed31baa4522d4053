import { NextFunction, Request, Response } from 'express';

import { CustomError } from 'App/errors/CustomError';
import { createLogger } from 'App/utils/logger';
// --------------------------------------------------------------

const log = createLogger('Http');

/**
 * Global error handling middleware.
 * Renders CustomError instances with their own status and code; anything
 * else becomes a 500 without leaking its message.
 */
function errorHandler(
  err: CustomError | Error,
  req: Request,
  res: Response,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  next: NextFunction,
): void {
  const statusCode: number = err instanceof CustomError ? err.statusCode : 500;
  const code: string =
    err instanceof CustomError ? err.code : 'INTERNAL_SERVER_ERROR';
  const message: string =
    err instanceof CustomError ? err.message : 'An unexpected error occurred';
  const details = err instanceof CustomError ? err.details : undefined;

  log.error('Error occurred', {
    statusCode,
    code,
    message: err.message,
    method: req.method,
    url: req.originalUrl,
    ip: req.ip,
    stack: err.stack,
  });

  res.status(statusCode).json({
    code,
    message,
    details,
  });
}

export default errorHandler;
