import { Request, Response, NextFunction, RequestHandler } from 'express';
import { nanoid } from 'nanoid';
import { withCorrelationId, type Logger } from '../logger';
import '../types/express';

export const CORRELATION_HEADER = 'x-correlation-id';

/**
 * Reads the caller's correlation id or mints one, echoes it on the response,
 * binds it to a per-request child logger and logs request completion.
 */
export const correlation = (logger: Logger): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    const provided = req.get(CORRELATION_HEADER);
    const correlationId = provided && provided.length > 0 ? provided : nanoid();

    req.correlationId = correlationId;
    req.log = withCorrelationId(logger, correlationId);
    res.setHeader(CORRELATION_HEADER, correlationId);

    const startedAt = process.hrtime.bigint();
    res.on('finish', () => {
      const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
      req.log.info(
        { method: req.method, path: req.originalUrl, statusCode: res.statusCode, durationMs },
        'request_completed'
      );
    });

    next();
  };
};
