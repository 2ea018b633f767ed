/**
 * A named resolver for interpolation variables.
 *
 * Lookups are registered under a prefix in a `ConfigurationInterpolator`
 * (`${prefix:name}`) or as default lookups that receive the whole variable
 * text. Returning `undefined` means "not found"; the interpolator then tries
 * the next candidate or leaves the placeholder untouched.
 * @example
 * ```typescript
 * const echo: ILookup = { lookup: (name) => name };
 * interpolator.registerLookup('echo', echo);
 * interpolator.interpolate('${echo:hello}'); // 'hello'
 * ```
 * @public
 */
export interface ILookup {
  /**
   * Resolves a variable name.
   * @param name - The variable name with the prefix already stripped
   * @returns The replacement text, or undefined when the name is unknown
   */
  lookup(name: string): string | undefined;
}
