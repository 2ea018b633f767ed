import type { ILookup } from '@cfgtree/models';
import { createScopedLogger, type ILogger } from '../../logger.js';

const FORBIDDEN_SEGMENTS = new Set(['__proto__', 'prototype', 'constructor']);

export interface ConstantLookupOptions {
  /**
   * Also resolve holders by walking `globalThis` along the dotted holder
   * name. Off by default.
   */
  allowGlobalAccess?: boolean;
  logger?: ILogger;
}

/**
 * Resolves `Holder.FIELD` names to the value of a field of a constant
 * holder, usually a class with static members or a frozen object.
 *
 * Holders are registered process-wide under a (possibly dotted) name.
 * Resolved values are cached per lookup instance.
 * @example
 * ```typescript
 * class Limits { static readonly MAX_USERS = 100; }
 * ConstantLookup.registerHolder('app.Limits', Limits);
 * interpolator.interpolate('${const:app.Limits.MAX_USERS}'); // '100'
 * ```
 * @public
 */
export class ConstantLookup implements ILookup {
  private static readonly holders = new Map<string, object>();

  private readonly cache = new Map<string, string>();
  private readonly allowGlobalAccess: boolean;
  private readonly logger: ILogger;

  public constructor(options: ConstantLookupOptions = {}) {
    this.allowGlobalAccess = options.allowGlobalAccess ?? false;
    this.logger = options.logger ?? createScopedLogger('const-lookup');
  }

  public static registerHolder(name: string, holder: object): void {
    ConstantLookup.holders.set(name, holder);
  }

  /**
   * @returns true if a holder was registered under the name
   */
  public static deregisterHolder(name: string): boolean {
    return ConstantLookup.holders.delete(name);
  }

  public clearCache(): void {
    this.cache.clear();
  }

  public lookup(name: string): string | undefined {
    const cached = this.cache.get(name);
    if (cached !== undefined) {
      return cached;
    }

    const separator = name.lastIndexOf('.');
    if (separator <= 0) {
      return undefined;
    }
    const holderName = name.slice(0, separator);
    const fieldName = name.slice(separator + 1);
    if (FORBIDDEN_SEGMENTS.has(fieldName)) {
      return undefined;
    }

    const holder = this.resolveHolder(holderName);
    if (holder === undefined || !Object.hasOwn(holder, fieldName)) {
      this.logger.debug('Constant not found', { name });
      return undefined;
    }
    const value: unknown = Reflect.get(holder, fieldName);
    if (value === undefined || value === null) {
      return undefined;
    }

    const result = String(value);
    this.cache.set(name, result);
    return result;
  }

  private resolveHolder(holderName: string): object | undefined {
    const registered = ConstantLookup.holders.get(holderName);
    if (registered !== undefined || !this.allowGlobalAccess) {
      return registered;
    }

    let current: unknown = globalThis;
    for (const segment of holderName.split('.')) {
      if (
        FORBIDDEN_SEGMENTS.has(segment) ||
        !isObjectLike(current) ||
        !Object.hasOwn(current, segment)
      ) {
        return undefined;
      }
      current = Reflect.get(current, segment);
    }
    return isObjectLike(current) ? current : undefined;
  }
}

function isObjectLike(value: unknown): value is object {
  return (
    (typeof value === 'object' && value !== null) || typeof value === 'function'
  );
}
