/**
 * Pino logger setup with automatic redaction of sensitive data
 *
 * Configuration values frequently carry credentials, so every log record
 * passes through path-based redaction before it is written.
 */

import pino from 'pino';
import { LogLevelSchema } from '@cfgtree/schemas';

/**
 * Environment variable selecting the log level of {@link rootLogger}.
 * @public
 */
export const LOG_LEVEL_ENV = 'CFGTREE_LOG_LEVEL';

/**
 * Paths whose values are censored in every log record.
 * @internal
 */
export const REDACT_PATHS = [
  'password',
  '*.password',
  'secret',
  '*.secret',
  'token',
  '*.token',
  'apiKey',
  '*.apiKey',
  'api_key',
  '*.api_key',
  'credential',
  '*.credential',
  'authorization',
  '*.authorization',
];

/**
 * Reads the log level from CFGTREE_LOG_LEVEL.
 *
 * Falls back to 'silent' when the variable is unset or holds an unknown
 * level, so the library stays quiet inside host applications by default.
 * @param env - Environment to read from
 * @internal
 */
export function resolveLogLevel(
  env: Record<string, string | undefined> = process.env,
): pino.LevelWithSilent {
  const raw = env[LOG_LEVEL_ENV];
  if (raw === undefined) {
    return 'silent';
  }
  const parsed = LogLevelSchema.safeParse(raw);
  return parsed.success ? parsed.data : 'silent';
}

/**
 * Root logger instance with automatic redaction of sensitive data.
 *
 * @example
 * ```typescript
 * import { rootLogger } from './pino-setup.js';
 *
 * rootLogger.level = 'debug';
 * rootLogger.info({ password: 'secret' }); // Logs: { password: '[REDACTED]' }
 * ```
 *
 * @public
 */
const rootLogger = pino({
  name: 'cfgtree',
  level: resolveLogLevel(),
  redact: {
    paths: REDACT_PATHS,
    censor: '[REDACTED]',
    remove: false,
  },
  serializers: {
    ...pino.stdSerializers,
    err: pino.stdSerializers.err,
  },
});

export { rootLogger };
