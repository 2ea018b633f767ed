/**
 * Variable interpolation for configuration values.
 *
 * Replaces `${prefix:name}` placeholders with values obtained from lookups.
 * A registered prefix lookup is asked first; when it has no answer the
 * default lookups receive the whole variable text, and finally the parent
 * interpolator is consulted. Resolved values are interpolated in turn.
 * @public
 */

import type { ILookup } from '@cfgtree/models';
import { InterpolationCycleError } from '../errors/index.js';
import { createScopedLogger, type ILogger } from '../logger.js';
import { entriesOf, type KeyedSource } from '../utils/entries.js';
import { getDefaultPrefixLookups } from './lookups/default-lookups.js';

const VAR_START = '${';
const VAR_END = '}';
const ESCAPE_CHAR = '$';
const ESCAPED_START = ESCAPE_CHAR + VAR_START;
const DEFAULT_SEPARATOR = ':-';
const PREFIX_SEPARATOR = ':';

/**
 * Everything needed to set up an interpolator in one step.
 * @public
 */
export interface InterpolatorSpecification {
  /** Returned as is by fromSpecification when set */
  interpolator?: ConfigurationInterpolator;
  prefixLookups?: KeyedSource<ILookup>;
  defaultLookups?: readonly ILookup[];
  parentInterpolator?: ConfigurationInterpolator;
  enableSubstitutionInVariables?: boolean;
  logger?: ILogger;
}

/**
 * @example
 * ```typescript
 * const interpolator = new ConfigurationInterpolator();
 * interpolator.registerLookup('env', new EnvironmentLookup());
 * interpolator.interpolate('${env:HOME}/app'); // '/home/user/app'
 * interpolator.interpolate('$${env:HOME}'); // '${env:HOME}'
 * ```
 * @public
 */
export class ConfigurationInterpolator {
  // Replaced as a whole on every change; resolve() may be iterating the old ones
  private prefixLookups: ReadonlyMap<string, ILookup> = new Map();
  private defaultLookups: readonly ILookup[] = [];
  private parentInterpolator: ConfigurationInterpolator | undefined;
  private substitutionInVariables = false;
  private readonly logger: ILogger;

  public constructor(logger: ILogger = createScopedLogger('interpolator')) {
    this.logger = logger;
  }

  /**
   * Creates an interpolator from a specification. If the specification
   * carries a ready interpolator, that instance is returned.
   */
  public static fromSpecification(
    specification: InterpolatorSpecification,
  ): ConfigurationInterpolator {
    if (specification.interpolator !== undefined) {
      return specification.interpolator;
    }
    const interpolator = new ConfigurationInterpolator(specification.logger);
    if (specification.prefixLookups !== undefined) {
      interpolator.registerLookups(specification.prefixLookups);
    }
    for (const lookup of specification.defaultLookups ?? []) {
      interpolator.addDefaultLookup(lookup);
    }
    interpolator.setParentInterpolator(specification.parentInterpolator);
    interpolator.setEnableSubstitutionInVariables(
      specification.enableSubstitutionInVariables ?? false,
    );
    return interpolator;
  }

  /**
   * The built-in prefix lookups, narrowed by CFGTREE_DEFAULT_PREFIX_LOOKUPS
   * when that variable is set.
   */
  public static getDefaultPrefixLookups(): ReadonlyMap<string, ILookup> {
    return getDefaultPrefixLookups();
  }

  /**
   * Registers a lookup for a prefix, replacing any lookup registered before.
   */
  public registerLookup(prefix: string, lookup: ILookup): void {
    const lookups = new Map(this.prefixLookups);
    lookups.set(prefix, lookup);
    this.prefixLookups = lookups;
  }

  public registerLookups(
    lookups: KeyedSource<ILookup>,
  ): void {
    const merged = new Map(this.prefixLookups);
    for (const [prefix, lookup] of entriesOf(lookups)) {
      merged.set(prefix, lookup);
    }
    this.prefixLookups = merged;
  }

  /**
   * @returns true if a lookup was registered for the prefix
   */
  public deregisterLookup(prefix: string): boolean {
    if (!this.prefixLookups.has(prefix)) {
      return false;
    }
    const lookups = new Map(this.prefixLookups);
    lookups.delete(prefix);
    this.prefixLookups = lookups;
    return true;
  }

  public prefixSet(): ReadonlySet<string> {
    return new Set(this.prefixLookups.keys());
  }

  /**
   * Snapshot of the prefix table.
   */
  public getLookups(): ReadonlyMap<string, ILookup> {
    return this.prefixLookups;
  }

  public addDefaultLookup(lookup: ILookup): void {
    this.defaultLookups = [...this.defaultLookups, lookup];
  }

  public addDefaultLookups(lookups: Iterable<ILookup>): void {
    this.defaultLookups = [...this.defaultLookups, ...lookups];
  }

  /**
   * @returns true if the lookup was one of the default lookups
   */
  public removeDefaultLookup(lookup: ILookup): boolean {
    const index = this.defaultLookups.indexOf(lookup);
    if (index < 0) {
      return false;
    }
    this.defaultLookups = this.defaultLookups.filter((_, i) => i !== index);
    return true;
  }

  public getDefaultLookups(): readonly ILookup[] {
    return this.defaultLookups;
  }

  public getParentInterpolator(): ConfigurationInterpolator | undefined {
    return this.parentInterpolator;
  }

  public setParentInterpolator(
    parent: ConfigurationInterpolator | undefined,
  ): void {
    this.parentInterpolator = parent;
  }

  public isEnableSubstitutionInVariables(): boolean {
    return this.substitutionInVariables;
  }

  /**
   * When enabled, variable names are interpolated before they are resolved,
   * so `${${kind}.port}` looks up `http.port` if `kind` is `http`.
   */
  public setEnableSubstitutionInVariables(enabled: boolean): void {
    this.substitutionInVariables = enabled;
  }

  /**
   * Resolves a single variable (the text between `${` and `}`).
   * @returns The value, or undefined if no lookup knows the variable
   */
  public resolve(variable: string): string | undefined {
    const prefixPos = variable.indexOf(PREFIX_SEPARATOR);
    if (prefixPos >= 0) {
      const lookup = this.prefixLookups.get(variable.slice(0, prefixPos));
      if (lookup !== undefined) {
        const value = lookup.lookup(variable.slice(prefixPos + 1));
        if (value !== undefined) {
          return value;
        }
      }
    }

    for (const lookup of this.defaultLookups) {
      const value = lookup.lookup(variable);
      if (value !== undefined) {
        return value;
      }
    }

    return this.parentInterpolator?.resolve(variable);
  }

  /**
   * Replaces all variables in a value. Non-string values are returned
   * unchanged; strings without `${` are returned as they are.
   * @throws \{InterpolationCycleError\} When a variable refers to itself
   */
  public interpolate(value: string): string;
  public interpolate(value: unknown): unknown;
  public interpolate(value: unknown): unknown {
    if (typeof value !== 'string' || !value.includes(VAR_START)) {
      return value;
    }
    return this.substitute(value, [], value);
  }

  private substitute(
    text: string,
    priorVariables: readonly string[],
    source: string,
  ): string {
    let result = '';
    let pos = 0;

    while (pos < text.length) {
      if (text.startsWith(ESCAPED_START, pos)) {
        result += VAR_START;
        pos += ESCAPED_START.length;
        continue;
      }
      if (!text.startsWith(VAR_START, pos)) {
        result += text[pos];
        pos++;
        continue;
      }

      const end = findVariableEnd(text, pos + VAR_START.length);
      if (end < 0) {
        // Unterminated; keep the marker and continue with what follows it
        result += VAR_START;
        pos += VAR_START.length;
        continue;
      }

      const placeholder = text.slice(pos, end + VAR_END.length);
      const replacement = this.resolveVariable(
        text.slice(pos + VAR_START.length, end),
        priorVariables,
        source,
      );
      result += replacement ?? placeholder;
      pos = end + VAR_END.length;
    }

    return result;
  }

  private resolveVariable(
    expression: string,
    priorVariables: readonly string[],
    source: string,
  ): string | undefined {
    const variableText = this.substitutionInVariables
      ? this.substitute(expression, priorVariables, source)
      : expression;

    const separator = variableText.indexOf(DEFAULT_SEPARATOR);
    const name =
      separator < 0 ? variableText : variableText.slice(0, separator);
    const defaultValue =
      separator < 0
        ? undefined
        : variableText.slice(separator + DEFAULT_SEPARATOR.length);

    if (priorVariables.includes(name)) {
      const error = InterpolationCycleError.infiniteLoop(source, [
        ...priorVariables,
        name,
      ]);
      this.logger.warn('Interpolation cycle detected', {
        variable: name,
        chain: error.chain,
      });
      throw error;
    }

    const value = this.resolve(name) ?? defaultValue;
    if (value === undefined) {
      this.logger.debug('Variable could not be resolved', { variable: name });
      return undefined;
    }
    return this.substitute(value, [...priorVariables, name], source);
  }
}

/**
 * Index of the `}` closing a variable whose name starts at `start`; nested
 * `${...}` are skipped. -1 if there is none.
 */
function findVariableEnd(text: string, start: number): number {
  let depth = 0;
  let pos = start;
  while (pos < text.length) {
    if (text.startsWith(VAR_START, pos)) {
      depth++;
      pos += VAR_START.length;
    } else if (text.startsWith(VAR_END, pos)) {
      if (depth === 0) {
        return pos;
      }
      depth--;
      pos += VAR_END.length;
    } else {
      pos++;
    }
  }
  return -1;
}
