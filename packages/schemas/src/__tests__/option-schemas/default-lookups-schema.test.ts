import { describe, it, expect } from 'vitest';
import {
  DefaultLookupSelectionSchema,
  LogLevelSchema,
} from '../../config/index.js';

describe('DefaultLookupSelectionSchema', () => {
  it('should split on commas and whitespace', () => {
    expect(
      DefaultLookupSelectionSchema.parse('environment, system_properties'),
    ).toEqual(['ENVIRONMENT', 'SYSTEM_PROPERTIES']);
  });

  it('should ignore empty entries', () => {
    expect(DefaultLookupSelectionSchema.parse(' ,const,, file ')).toEqual([
      'CONST',
      'FILE',
    ]);
  });

  it('should yield an empty list for a blank string', () => {
    expect(DefaultLookupSelectionSchema.parse('   ')).toEqual([]);
  });

  it('should reject unknown lookup names', () => {
    expect(DefaultLookupSelectionSchema.safeParse('env,bogus').success).toBe(
      false,
    );
  });
});

describe('LogLevelSchema', () => {
  it('should normalize case and whitespace', () => {
    expect(LogLevelSchema.parse(' DEBUG ')).toBe('debug');
  });

  it('should reject unknown levels', () => {
    expect(LogLevelSchema.safeParse('verbose').success).toBe(false);
  });
});
