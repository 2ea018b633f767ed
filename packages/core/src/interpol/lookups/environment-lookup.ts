import type { ILookup } from '@cfgtree/models';

/**
 * Resolves names from the process environment, read on every call.
 * @public
 */
export class EnvironmentLookup implements ILookup {
  public constructor(
    private readonly env: Record<string, string | undefined> = process.env,
  ) {}

  public lookup(name: string): string | undefined {
    return this.env[name];
  }
}
