import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import {
  DefaultListDelimiterHandler,
  DisabledListDelimiterHandler,
  LegacyListDelimiterHandler,
} from '../list-delimiter-handler.js';
import { UnsupportedOperationError } from '../../errors/index.js';

describe('DefaultListDelimiterHandler', () => {
  const handler = new DefaultListDelimiterHandler(',');

  describe('split', () => {
    it('should split at unescaped delimiters', () => {
      expect(handler.split('a,b,c')).toEqual(['a', 'b', 'c']);
    });

    it('should keep escaped delimiters inside elements', () => {
      expect(handler.split('a\\,b,c')).toEqual(['a,b', 'c']);
    });

    it('should unescape doubled backslashes', () => {
      expect(handler.split('C:\\\\temp,x')).toEqual(['C:\\temp', 'x']);
    });

    it('should keep a backslash that escapes nothing', () => {
      expect(handler.split('a\\b')).toEqual(['a\\b']);
      expect(handler.split('end\\')).toEqual(['end\\']);
    });

    it('should keep empty segments', () => {
      expect(handler.split('a,,b,')).toEqual(['a', '', 'b', '']);
    });

    it('should trim elements on request', () => {
      expect(handler.split(' a , b ', true)).toEqual(['a', 'b']);
      expect(handler.split(' a , b ')).toEqual([' a ', ' b ']);
    });

    it('should honour a custom delimiter', () => {
      const semicolon = new DefaultListDelimiterHandler(';');
      expect(semicolon.split('a,b;c')).toEqual(['a,b', 'c']);
    });
  });

  describe('escape and join', () => {
    it('should escape the delimiter and backslashes', () => {
      expect(handler.escape('a,b\\c')).toBe('a\\,b\\\\c');
    });

    it('should join with escaping', () => {
      expect(handler.join(['x', 'y,z'])).toBe('x,y\\,z');
    });

    it('should reproduce any non-empty list through split(join(list))', () => {
      const lists: string[][] = [
        ['plain'],
        ['a', 'b', 'c'],
        ['with,comma', 'with\\backslash', ''],
        ['\\', ',', '\\,', 'trailing\\'],
        [' spaced ', '', ''],
      ];
      for (const list of lists) {
        expect(handler.split(handler.join(list))).toEqual(list);
      }
    });

    it('should join the empty list to the empty string', () => {
      expect(handler.join([])).toBe('');
      expect(handler.split('')).toEqual(['']);
    });
  });

  it('should reject delimiters other than a single non-backslash character', () => {
    expect(() => new DefaultListDelimiterHandler('::')).toThrow(ZodError);
    expect(() => new DefaultListDelimiterHandler('')).toThrow(ZodError);
    expect(() => new DefaultListDelimiterHandler('\\')).toThrow(ZodError);
  });

  describe('parse', () => {
    it('should split strings and trim the elements', () => {
      expect(handler.parse('1, 2,3')).toEqual(['1', '2', '3']);
    });

    it('should flatten nested arrays and skip null values', () => {
      expect(handler.parse(['a,b', [1, null, ['c']], undefined])).toEqual([
        'a',
        'b',
        1,
        'c',
      ]);
    });

    it('should wrap scalars in a list', () => {
      expect(handler.parse(42)).toEqual([42]);
      expect(handler.parse(null)).toEqual([]);
    });
  });
});

describe('LegacyListDelimiterHandler', () => {
  const handler = new LegacyListDelimiterHandler(',');

  it('should split and trim by default', () => {
    expect(handler.split('a, b ,c')).toEqual(['a', 'b', 'c']);
  });

  it('should treat a doubled backslash as a single one', () => {
    expect(handler.split('a\\\\,b')).toEqual(['a\\', 'b']);
  });

  it('should only escape the delimiter', () => {
    expect(handler.escape('a,b\\c')).toBe('a\\,b\\c');
  });

  it('should double a trailing backslash of non-final elements when joining', () => {
    expect(handler.join(['a\\', 'b'])).toBe('a\\\\,b');
    expect(handler.split(handler.join(['a\\', 'b']))).toEqual(['a\\', 'b']);
  });

  it('should take strings without the delimiter as they are', () => {
    expect(handler.split('C:\\\\temp')).toEqual(['C:\\\\temp']);
    expect(handler.split(' x ')).toEqual([' x ']);
  });

  it('should double backslashes of list elements when joining', () => {
    expect(handler.join(['x\\\\y', 'z'])).toBe('x\\\\\\\\y,z');
    expect(handler.split(handler.join(['x\\\\y', 'z']), false)).toEqual([
      'x\\\\y',
      'z',
    ]);
    expect(handler.split(handler.join(['a\\b', 'c,d']), false)).toEqual([
      'a\\b',
      'c,d',
    ]);
  });

  it('should leave a single element without the delimiter unchanged', () => {
    expect(handler.join(['C:\\\\temp'])).toBe('C:\\\\temp');
  });

  it('should reject a backslash delimiter', () => {
    expect(() => new LegacyListDelimiterHandler('\\')).toThrow(ZodError);
  });
});

describe('DisabledListDelimiterHandler', () => {
  const handler = new DisabledListDelimiterHandler();

  it('should never split', () => {
    expect(handler.split('a,b,c')).toEqual(['a,b,c']);
    expect(handler.parse('a,b')).toEqual(['a,b']);
  });

  it('should still flatten arrays', () => {
    expect(handler.parse(['a,b', ['c']])).toEqual(['a,b', 'c']);
  });

  it('should return values unchanged from escape', () => {
    expect(handler.escape('a,b')).toBe('a,b');
  });

  it('should refuse to join', () => {
    expect(() => handler.join(['a', 'b'])).toThrow(UnsupportedOperationError);
  });
});
