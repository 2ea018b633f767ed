import type pino from 'pino';
import { rootLogger } from './logging/pino-setup.js';

/**
 * Logging abstraction used across the configuration packages.
 *
 * Interpolators, lookups and configurations log through this interface so
 * host applications can plug in their own logger without touching the core.
 * @public
 */
export interface ILogger {
  /** Unresolved variables, constants not found, configuration changes */
  debug(message: string, context?: Record<string, unknown>): void;

  info(message: string, context?: Record<string, unknown>): void;

  /** Interpolation cycles and files the file lookup cannot read */
  warn(message: string, context?: Record<string, unknown>): void;

  /**
   * @param error - Wrapped into an Error when it is not one
   */
  error(
    message: string,
    error?: Error | unknown,
    context?: Record<string, unknown>,
  ): void;
}

/**
 * ILogger backed by a pino child of the redacting root logger.
 * @public
 */
export class PinoLogger implements ILogger {
  private readonly logger: pino.Logger;

  public constructor(scope: string, parent: pino.Logger = rootLogger) {
    this.logger = parent.child({ scope });
  }

  public debug(message: string, context?: Record<string, unknown>): void {
    this.logger.debug(context ?? {}, message);
  }

  public info(message: string, context?: Record<string, unknown>): void {
    this.logger.info(context ?? {}, message);
  }

  public warn(message: string, context?: Record<string, unknown>): void {
    this.logger.warn(context ?? {}, message);
  }

  public error(
    message: string,
    error?: Error | unknown,
    context?: Record<string, unknown>,
  ): void {
    const baseContext = context ?? {};
    if (error === undefined) {
      this.logger.error(baseContext, message);
      return;
    }
    this.logger.error(
      {
        ...baseContext,
        err: error instanceof Error ? error : new Error(String(error)),
      },
      message,
    );
  }
}

/**
 * Discards every record. Pass it to a configuration or interpolator to
 * silence it regardless of CFGTREE_LOG_LEVEL.
 * @public
 */
export class NoOpLogger implements ILogger {
  public debug(): void {}
  public info(): void {}
  public warn(): void {}
  public error(): void {}
}

/**
 * Creates a logger whose records carry the given scope.
 * @param scope - The scope recorded on every log line
 * @public
 */
export function createScopedLogger(scope: string): ILogger {
  return new PinoLogger(scope);
}
