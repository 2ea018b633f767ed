import { describe, it, expect } from 'vitest';
import { PropertyConverter } from '../property-converter.js';
import { ConversionError } from '../../errors/index.js';

describe('PropertyConverter', () => {
  describe('toBoolean', () => {
    it.each([
      ['true', true],
      ['YES', true],
      [' on ', true],
      ['y', true],
      ['t', true],
      ['false', false],
      ['No', false],
      ['off', false],
      ['n', false],
      ['f', false],
    ])('should convert %j to %s', (input, expected) => {
      expect(PropertyConverter.toBoolean(input)).toBe(expected);
    });

    it('should pass booleans through', () => {
      expect(PropertyConverter.toBoolean(false)).toBe(false);
    });

    it('should reject other values', () => {
      expect(() => PropertyConverter.toBoolean('maybe')).toThrow(
        ConversionError,
      );
      expect(() => PropertyConverter.toBoolean(1)).toThrow(ConversionError);
    });
  });

  describe('toNumber', () => {
    it('should parse decimal, hex and binary strings', () => {
      expect(PropertyConverter.toNumber('3.5')).toBe(3.5);
      expect(PropertyConverter.toNumber('0x1F')).toBe(31);
      expect(PropertyConverter.toNumber('-0x10')).toBe(-16);
      expect(PropertyConverter.toNumber('0b101')).toBe(5);
    });

    it('should reject blank and non-numeric strings', () => {
      expect(() => PropertyConverter.toNumber('')).toThrow(ConversionError);
      expect(() => PropertyConverter.toNumber('12abc')).toThrow(
        ConversionError,
      );
    });

    it('should carry target type and value on the error', () => {
      try {
        PropertyConverter.toNumber('abc');
        expect.fail('expected a conversion error');
      } catch (error) {
        expect(error).toBeInstanceOf(ConversionError);
        if (error instanceof ConversionError) {
          expect(error.targetType).toBe('number');
          expect(error.value).toBe('abc');
          expect(error.forKey('db.port').key).toBe('db.port');
        }
      }
    });
  });

  describe('toInteger', () => {
    it('should accept whole numbers only', () => {
      expect(PropertyConverter.toInteger('42')).toBe(42);
      expect(() => PropertyConverter.toInteger('4.2')).toThrow(
        /to integer$/,
      );
    });
  });

  describe('toBigInt', () => {
    it('should parse large and signed values', () => {
      expect(PropertyConverter.toBigInt('9007199254740993')).toBe(
        9007199254740993n,
      );
      expect(PropertyConverter.toBigInt('-0xff')).toBe(-255n);
      expect(PropertyConverter.toBigInt(7)).toBe(7n);
    });

    it('should reject fractions', () => {
      expect(() => PropertyConverter.toBigInt('1.5')).toThrow(ConversionError);
    });
  });

  describe('toDate', () => {
    it('should parse ISO strings and epoch numbers', () => {
      expect(PropertyConverter.toDate('2024-01-02T03:04:05.000Z').getTime()).toBe(
        Date.UTC(2024, 0, 2, 3, 4, 5),
      );
      expect(PropertyConverter.toDate(0).toISOString()).toBe(
        '1970-01-01T00:00:00.000Z',
      );
    });

    it('should reject unparsable strings', () => {
      expect(() => PropertyConverter.toDate('not a date')).toThrow(
        ConversionError,
      );
    });
  });

  describe('toStringValue', () => {
    it('should take the first element of lists', () => {
      expect(PropertyConverter.toStringValue(['a', 'b'])).toBe('a');
      expect(PropertyConverter.toStringValue([])).toBeUndefined();
    });

    it('should stringify scalars', () => {
      expect(PropertyConverter.toStringValue(8080)).toBe('8080');
      expect(PropertyConverter.toStringValue(null)).toBeUndefined();
    });
  });
});
