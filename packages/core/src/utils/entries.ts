/**
 * Keyed collections accepted by the public API: a Map or a plain record.
 */
export type KeyedSource<T> = ReadonlyMap<string, T> | Readonly<Record<string, T>>;

function isMap<T>(source: KeyedSource<T>): source is ReadonlyMap<string, T> {
  return source instanceof Map;
}

/**
 * Entries of a Map or a record, in insertion order.
 */
export function entriesOf<T>(source: KeyedSource<T>): Array<[string, T]> {
  return isMap(source) ? [...source.entries()] : Object.entries(source);
}
