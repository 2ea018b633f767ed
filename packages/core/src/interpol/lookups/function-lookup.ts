import type { ILookup } from '@cfgtree/models';
import { entriesOf, type KeyedSource } from '../../utils/entries.js';

/**
 * Adapts a plain function to the lookup interface.
 * @example
 * ```typescript
 * const echo = new FunctionLookup((name) => name);
 * ```
 * @public
 */
export class FunctionLookup implements ILookup {
  public constructor(
    private readonly fn: (name: string) => string | undefined,
  ) {}

  public lookup(name: string): string | undefined {
    return this.fn(name);
  }
}

/**
 * Resolves names from a fixed set of values. Non-string values are
 * converted with `String`.
 * @public
 */
export class MapLookup implements ILookup {
  private readonly values: ReadonlyMap<string, unknown>;

  public constructor(values: KeyedSource<unknown>) {
    this.values = new Map(entriesOf(values));
  }

  public lookup(name: string): string | undefined {
    const value = this.values.get(name);
    return value === undefined || value === null ? undefined : String(value);
  }
}
