/**
 * @module @chipload/core
 * @description Shared infrastructure for the cutting-parameter engine
 *
 * Exports:
 * - Structured pino logger
 * - Operational error base classes
 * - Environment configuration and calculation defaults
 */

export {
  createLogger,
  withCorrelationId,
  generateCorrelationId,
  usePrettyOutput,
  logger,
  type Logger,
  type CreateLoggerOptions,
} from './logger.js';

export {
  AppError,
  ConfigurationError,
  isOperationalError,
  toSafeErrorResponse,
  type SafeErrorDetails,
} from './errors.js';

export {
  CuttingEnvSchema,
  validateCuttingEnv,
  loadCuttingDefaults,
  type CuttingEnv,
  type CuttingDefaults,
} from './env.js';
