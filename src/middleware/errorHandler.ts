import { Request, Response, NextFunction, RequestHandler } from 'express';
import { AppError } from '../errors';
import '../types/express';

interface ParserError {
  type: string;
  status: number;
}

const isBodyParserError = (err: unknown): err is ParserError =>
  typeof err === 'object' &&
  err !== null &&
  'type' in err &&
  'status' in err &&
  typeof err.type === 'string' &&
  typeof err.status === 'number';

/**
 * Global error handling middleware
 * Prevents sensitive information leakage in production
 */
export const errorHandler = (isProduction: boolean) => (
  err: unknown,
  req: Request,
  res: Response,
  // Express identifies error middleware by arity
  next: NextFunction
) => {
  let statusCode = 500;
  let message = 'Internal server error';
  let kind: string | undefined;

  if (err instanceof AppError) {
    statusCode = err.statusCode;
    message = err.message;
    kind = err.kind;
  } else if (isBodyParserError(err)) {
    statusCode = err.status;
    message = err.type === 'entity.parse.failed' ? 'Malformed JSON body' : 'Invalid request body';
  } else if (err instanceof Error) {
    message = err.message;
  }

  if (statusCode >= 500) {
    req.log.error({ err, path: req.path, method: req.method, kind }, 'request_failed');
  } else {
    req.log.warn({ path: req.path, method: req.method, statusCode, kind, error: message }, 'request_rejected');
  }

  // In production, hide internal error details
  if (isProduction && statusCode === 500) {
    message = 'An unexpected error occurred. Please try again later.';
  }

  res.status(statusCode).json({
    error: message,
    ...(kind && { kind }),
  });
};

type AsyncRequestHandler = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

/**
 * Async route handler wrapper to catch errors
 */
export const asyncHandler = (fn: AsyncRequestHandler): RequestHandler => {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};

/**
 * 404 Not Found handler
 */
export const notFoundHandler = (req: Request, res: Response) => {
  res.status(404).json({ error: 'Resource not found' });
};
