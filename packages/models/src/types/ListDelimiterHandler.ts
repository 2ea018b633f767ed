/**
 * Splits delimited scalar strings into lists and performs the inverse.
 *
 * Consulted when values enter a configuration, whether through
 * `addProperty`/`setProperty` or with a tree passed to the constructor or to
 * `addNodes`, and when values are written to external formats.
 * @public
 */
export interface IListDelimiterHandler {
  /**
   * Splits a raw string at unescaped delimiters.
   * @param value - The raw string
   * @param trim - Whether each element is trimmed
   */
  split(value: string, trim?: boolean): string[];

  /**
   * Escapes a single value so that a later split reproduces it unchanged.
   */
  escape(value: string): string;

  /**
   * Joins a list into one string that `split` turns back into the same
   * non-empty list. The empty list joins to `''`, which splits into `['']`.
   * @throws \{UnsupportedOperationError\} When the handler cannot join lists
   */
  join(values: readonly string[]): string;

  /**
   * Turns an arbitrary value into the flat list of values it represents.
   * Strings are split, arrays and other iterables are flattened, everything
   * else becomes a one-element list.
   */
  parse(value: unknown): unknown[];
}
