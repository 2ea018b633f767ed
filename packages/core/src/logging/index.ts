/**
 * Logging infrastructure exports
 *
 * Structured logging through pino with automatic redaction
 */

export {
  rootLogger,
  resolveLogLevel,
  LOG_LEVEL_ENV,
  REDACT_PATHS,
} from './pino-setup.js';

export {
  PinoLogger,
  NoOpLogger,
  createScopedLogger,
} from '../logger.js';
export type { ILogger } from '../logger.js';
