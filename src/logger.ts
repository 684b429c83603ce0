import pino, { type Logger, type LoggerOptions } from 'pino';

export interface CreateLoggerOptions {
  name?: string;
  level?: string;
}

/**
 * Structured JSON logger shared by every component.
 * Request handlers derive a child carrying the correlation id.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const { name = 'prescription-service', level = process.env.LOG_LEVEL ?? 'info' } = options;

  const loggerOptions: LoggerOptions = {
    name,
    level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    base: null,
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
    },
  };

  return pino(loggerOptions);
}

export function withCorrelationId(logger: Logger, correlationId: string): Logger {
  return logger.child({ correlationId });
}

export type { Logger };
