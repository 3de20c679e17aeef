import pino, { type Logger, type LoggerOptions } from 'pino';

/**
 * Structured logger for the calculation engine
 *
 * - pino-pretty in development, JSON in production and test
 * - `silent` under NODE_ENV=test unless LOG_LEVEL says otherwise
 * - Correlation ID support for tracing one report run across modules
 */

export interface CreateLoggerOptions {
  name: string;
  level?: string;
  correlationId?: string;
  /** Human-readable output via pino-pretty; defaults to on in development */
  pretty?: boolean;
}

/**
 * Whether pino-pretty should format output
 */
export function usePrettyOutput(pretty?: boolean): boolean {
  return pretty ?? (process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test');
}

/**
 * Get default log level based on environment
 */
function getDefaultLevel(): string {
  const envLevel = process.env.LOG_LEVEL;

  if (envLevel) {
    return envLevel;
  }

  switch (process.env.NODE_ENV) {
    case 'production':
      return 'info';
    case 'test':
      return 'silent';
    default:
      return 'debug';
  }
}

/**
 * Create a logger instance
 */
export function createLogger(options: CreateLoggerOptions): Logger {
  const { name, level = getDefaultLevel(), correlationId } = options;

  const loggerOptions: LoggerOptions = {
    name,
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    // Use null to omit base, or provide correlationId if present
    base: correlationId ? { correlationId } : null,
    serializers: {
      err: pino.stdSerializers.err,
    },
  };

  if (usePrettyOutput(options.pretty)) {
    const transport = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        messageFormat: '{msg}',
      },
    }) as pino.DestinationStream;
    return pino(loggerOptions, transport);
  }

  return pino(loggerOptions);
}

/**
 * Create a child logger with correlation ID
 */
export function withCorrelationId(logger: Logger, correlationId: string): Logger {
  return logger.child({ correlationId });
}

/**
 * Generate a correlation ID
 */
export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 11)}`;
}

// Default logger instance
export const logger = createLogger({ name: process.env.SERVICE_NAME ?? 'chipload' });

export type { Logger };
