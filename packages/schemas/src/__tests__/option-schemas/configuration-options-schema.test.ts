import { describe, it, expect } from 'vitest';
import {
  ConfigurationOptionsSchema,
  ExpressionSymbolsSchema,
  ListDelimiterSchema,
} from '../../config/index.js';

describe('ConfigurationOptionsSchema', () => {
  it('should apply defaults to an empty object', () => {
    const result = ConfigurationOptionsSchema.parse({});

    expect(result).toEqual({
      listDelimiter: ',',
      listDelimiterHandler: 'default',
      throwExceptionOnMissing: false,
      enableSubstitutionInVariables: false,
    });
  });

  it('should accept null to disable list splitting', () => {
    const result = ConfigurationOptionsSchema.parse({ listDelimiter: null });
    expect(result.listDelimiter).toBeNull();
  });

  it('should reject multi-character delimiters', () => {
    expect(() =>
      ConfigurationOptionsSchema.parse({ listDelimiter: ';;' }),
    ).toThrow();
  });

  it('should reject the backslash as delimiter', () => {
    expect(ListDelimiterSchema.safeParse('\\').success).toBe(false);
  });

  it('should reject unknown options', () => {
    expect(
      ConfigurationOptionsSchema.safeParse({ listDelimeter: ';' }).success,
    ).toBe(false);
  });

  it('should reject an unknown handler type', () => {
    expect(
      ConfigurationOptionsSchema.safeParse({ listDelimiterHandler: 'fancy' })
        .success,
    ).toBe(false);
  });
});

describe('ExpressionSymbolsSchema', () => {
  it('should fill in the default symbols', () => {
    expect(ExpressionSymbolsSchema.parse({})).toEqual({
      propertyDelimiter: '.',
      escapedDelimiter: '..',
      attributeStart: '[@',
      attributeEnd: ']',
      indexStart: '(',
      indexEnd: ')',
    });
  });

  it('should keep explicit nulls', () => {
    const result = ExpressionSymbolsSchema.parse({
      propertyDelimiter: '/',
      escapedDelimiter: null,
      attributeStart: '@',
      attributeEnd: null,
    });

    expect(result.escapedDelimiter).toBeNull();
    expect(result.attributeEnd).toBeNull();
  });

  it('should reject an escaped delimiter that does not contain the delimiter', () => {
    const result = ExpressionSymbolsSchema.safeParse({
      propertyDelimiter: '/',
      escapedDelimiter: '..',
    });

    expect(result.success).toBe(false);
  });

  it('should reject empty symbols', () => {
    expect(
      ExpressionSymbolsSchema.safeParse({ propertyDelimiter: '' }).success,
    ).toBe(false);
  });
});
