import { ConversionError } from '../errors/index.js';

const TRUE_STRINGS = new Set(['true', 'yes', 'on', 'y', 't']);
const FALSE_STRINGS = new Set(['false', 'no', 'off', 'n', 'f']);

const HEX_PATTERN = /^[+-]?0x[0-9a-f]+$/i;
const BINARY_PATTERN = /^[+-]?0b[01]+$/i;

/**
 * Converts raw property values to the types requested by the typed
 * accessors of a configuration.
 *
 * Every function throws {@link ConversionError} when the value has no
 * sensible representation in the target type.
 * @public
 */
export const PropertyConverter = {
  /**
   * Accepts booleans and the strings true/yes/on/y/t and false/no/off/n/f
   * in any case.
   */
  toBoolean(value: unknown): boolean {
    if (typeof value === 'boolean') {
      return value;
    }
    if (typeof value === 'string') {
      const normalized = value.trim().toLowerCase();
      if (TRUE_STRINGS.has(normalized)) {
        return true;
      }
      if (FALSE_STRINGS.has(normalized)) {
        return false;
      }
    }
    throw ConversionError.notConvertible(value, 'boolean');
  },

  /**
   * Accepts numbers, bigints and numeric strings, including `0x` hex and
   * `0b` binary notation.
   */
  toNumber(value: unknown): number {
    if (typeof value === 'number') {
      return value;
    }
    if (typeof value === 'bigint') {
      return Number(value);
    }
    if (typeof value === 'string') {
      const parsed = parseNumber(value.trim());
      if (parsed !== undefined) {
        return parsed;
      }
    }
    throw ConversionError.notConvertible(value, 'number');
  },

  toInteger(value: unknown): number {
    let result: number;
    try {
      result = PropertyConverter.toNumber(value);
    } catch (error) {
      if (error instanceof ConversionError) {
        throw ConversionError.notConvertible(value, 'integer');
      }
      throw error;
    }
    if (!Number.isSafeInteger(result)) {
      throw ConversionError.notConvertible(value, 'integer');
    }
    return result;
  },

  toBigInt(value: unknown): bigint {
    if (typeof value === 'bigint') {
      return value;
    }
    if (typeof value === 'number' && Number.isInteger(value)) {
      return BigInt(value);
    }
    if (typeof value === 'string') {
      const trimmed = value.trim();
      const negative = trimmed.startsWith('-');
      const digits = negative || trimmed.startsWith('+') ? trimmed.slice(1) : trimmed;
      if (/^(0x[0-9a-f]+|0b[01]+|\d+)$/i.test(digits)) {
        const magnitude = BigInt(digits);
        return negative ? -magnitude : magnitude;
      }
    }
    throw ConversionError.notConvertible(value, 'bigint');
  },

  /**
   * Accepts Date instances, epoch milliseconds and strings understood by
   * `Date.parse` (ISO 8601 in particular).
   */
  toDate(value: unknown): Date {
    if (value instanceof Date && !Number.isNaN(value.getTime())) {
      return value;
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
      return new Date(value);
    }
    if (typeof value === 'string') {
      const time = Date.parse(value.trim());
      if (!Number.isNaN(time)) {
        return new Date(time);
      }
    }
    throw ConversionError.notConvertible(value, 'Date');
  },

  /**
   * String form used for interpolation and string accessors. Lists yield
   * their first element; null and undefined yield undefined.
   */
  toStringValue(value: unknown): string | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }
    if (Array.isArray(value)) {
      return value.length > 0
        ? PropertyConverter.toStringValue(value[0])
        : undefined;
    }
    if (value instanceof Date) {
      return value.toISOString();
    }
    return String(value);
  },
};

function parseNumber(text: string): number | undefined {
  if (text.length === 0) {
    return undefined;
  }
  if (HEX_PATTERN.test(text) || BINARY_PATTERN.test(text)) {
    const negative = text.startsWith('-');
    const unsigned = text.replace(/^[+-]/, '');
    const radix = unsigned[1].toLowerCase() === 'x' ? 16 : 2;
    const magnitude = Number.parseInt(unsigned.slice(2), radix);
    return negative ? -magnitude : magnitude;
  }
  const result = Number(text);
  return Number.isNaN(result) ? undefined : result;
}
