import { z } from 'zod';

export const DefaultLookupNameSchema = z.enum([
  'BASE64_DECODER',
  'BASE64_ENCODER',
  'CONST',
  'ENVIRONMENT',
  'FILE',
  'LOCAL_HOST',
  'SYSTEM_PROPERTIES',
  'URL_DECODER',
  'URL_ENCODER',
]);

/**
 * Parses a comma- or whitespace-separated list of default lookup names, as
 * found in the CFGTREE_DEFAULT_PREFIX_LOOKUPS environment variable. Names
 * are case-insensitive.
 */
export const DefaultLookupSelectionSchema = z
  .string()
  .transform((value) =>
    value
      .split(/[\s,]+/)
      .filter((name) => name.length > 0)
      .map((name) => name.toUpperCase()),
  )
  .pipe(z.array(DefaultLookupNameSchema));
