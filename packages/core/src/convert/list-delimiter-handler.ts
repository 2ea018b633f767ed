/**
 * List delimiter handlers: splitting of delimited scalar strings into lists
 * and the inverse operation.
 * @public
 */

import type { IListDelimiterHandler } from '@cfgtree/models';
import { ListDelimiterSchema } from '@cfgtree/schemas';
import { UnsupportedOperationError } from '../errors/index.js';

const ESCAPE = '\\';
const DOUBLE_ESCAPE = ESCAPE + ESCAPE;

/**
 * Shared flattening logic. Subclasses decide how single strings are split.
 * @public
 */
export abstract class AbstractListDelimiterHandler
  implements IListDelimiterHandler
{
  public abstract split(value: string, trim?: boolean): string[];

  public abstract escape(value: string): string;

  public abstract join(values: readonly string[]): string;

  /**
   * Flattens a value into the values it represents. Strings are split with
   * trimming, iterables are flattened recursively, null and undefined are
   * dropped.
   */
  public parse(value: unknown): unknown[] {
    const result: unknown[] = [];
    this.flatten(value, result);
    return result;
  }

  private flatten(value: unknown, target: unknown[]): void {
    if (value === undefined || value === null) {
      return;
    }
    if (typeof value === 'string') {
      target.push(...this.split(value, true));
      return;
    }
    if (isIterable(value)) {
      for (const element of value) {
        this.flatten(element, target);
      }
      return;
    }
    target.push(value);
  }
}

/**
 * Splits at the delimiter character. A backslash escapes the delimiter and
 * itself; a backslash before any other character is kept. Empty segments are
 * preserved, so `split(join(list))` reproduces every non-empty list; the
 * empty list joins to `''`, which splits into `['']`.
 * @example
 * ```typescript
 * const handler = new DefaultListDelimiterHandler(',');
 * handler.split('a,b\\,c'); // ['a', 'b,c']
 * handler.join(['a', 'b,c']); // 'a,b\\,c'
 * ```
 * @public
 */
export class DefaultListDelimiterHandler extends AbstractListDelimiterHandler {
  /**
   * @throws \{ZodError\} When the delimiter is not a single character or is
   * the backslash
   */
  public constructor(public readonly delimiter: string = ',') {
    super();
    ListDelimiterSchema.parse(delimiter);
  }

  public split(value: string, trim = false): string[] {
    const parts: string[] = [];
    let current = '';
    let escaped = false;

    for (const ch of value) {
      if (escaped) {
        if (ch !== this.delimiter && ch !== ESCAPE) {
          current += ESCAPE;
        }
        current += ch;
        escaped = false;
      } else if (ch === ESCAPE) {
        escaped = true;
      } else if (ch === this.delimiter) {
        parts.push(current);
        current = '';
      } else {
        current += ch;
      }
    }
    if (escaped) {
      current += ESCAPE;
    }
    parts.push(current);

    return trim ? parts.map((part) => part.trim()) : parts;
  }

  public escape(value: string): string {
    let result = '';
    for (const ch of value) {
      if (ch === ESCAPE || ch === this.delimiter) {
        result += ESCAPE;
      }
      result += ch;
    }
    return result;
  }

  public join(values: readonly string[]): string {
    return values.map((value) => this.escape(value)).join(this.delimiter);
  }
}

/**
 * Splitting rules of older configuration files. Strings without the
 * delimiter are taken as they are. Otherwise the backslash escapes the
 * delimiter and `\\\\` stands for a single backslash; any other backslash
 * is kept. Joining doubles every backslash of the elements and escapes the
 * delimiter, so split restores each element.
 * @example
 * ```typescript
 * const handler = new LegacyListDelimiterHandler(',');
 * handler.split('C:\\\\temp'); // ['C:\\\\temp']
 * handler.join(['x\\\\y', 'z']); // 'x\\\\\\\\y,z'
 * ```
 * @public
 */
export class LegacyListDelimiterHandler extends AbstractListDelimiterHandler {
  /**
   * @throws \{ZodError\} When the delimiter is not a single character or is
   * the backslash
   */
  public constructor(public readonly delimiter: string = ',') {
    super();
    ListDelimiterSchema.parse(delimiter);
  }

  public split(value: string, trim = true): string[] {
    if (!value.includes(this.delimiter)) {
      return [value];
    }

    const parts: string[] = [];
    let current = '';
    let escaped = false;

    for (const ch of value) {
      if (escaped) {
        if (ch === this.delimiter) {
          current += ch;
        } else if (ch === ESCAPE) {
          current += ESCAPE;
        } else {
          current += ESCAPE + ch;
        }
        escaped = false;
      } else if (ch === ESCAPE) {
        escaped = true;
      } else if (ch === this.delimiter) {
        parts.push(current);
        current = '';
      } else {
        current += ch;
      }
    }
    if (escaped) {
      current += ESCAPE;
    }
    parts.push(current);

    return trim ? parts.map((part) => part.trim()) : parts;
  }

  /**
   * Escapes the delimiter only; backslashes pass through unchanged.
   */
  public escape(value: string): string {
    return value.split(this.delimiter).join(ESCAPE + this.delimiter);
  }

  /**
   * A single element without the delimiter is returned as it is, since
   * split leaves such strings untouched.
   */
  public join(values: readonly string[]): string {
    if (values.length === 1 && !values[0].includes(this.delimiter)) {
      return values[0];
    }
    return values
      .map((value) => this.escape(value.split(ESCAPE).join(DOUBLE_ESCAPE)))
      .join(this.delimiter);
  }
}

/**
 * Handler used when list splitting is switched off. Values are stored as
 * given; iterables are still flattened.
 * @public
 */
export class DisabledListDelimiterHandler extends AbstractListDelimiterHandler {
  public split(value: string): string[] {
    return [value];
  }

  public escape(value: string): string {
    return value;
  }

  /**
   * @throws \{UnsupportedOperationError\} Always; there is no delimiter to join with
   */
  public join(_values: readonly string[]): string {
    throw new UnsupportedOperationError(
      'Joining lists is not supported when list splitting is disabled',
    );
  }
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Symbol.iterator in value &&
    !(value instanceof Map)
  );
}
