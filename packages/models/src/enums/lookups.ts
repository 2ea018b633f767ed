/**
 * Names of the built-in prefix lookups, mapped to the prefix each one is
 * registered under.
 */
export const DefaultLookupPrefixes = {
  BASE64_DECODER: 'base64Decoder',
  BASE64_ENCODER: 'base64Encoder',
  CONST: 'const',
  ENVIRONMENT: 'env',
  FILE: 'file',
  LOCAL_HOST: 'localhost',
  SYSTEM_PROPERTIES: 'sys',
  URL_DECODER: 'urlDecoder',
  URL_ENCODER: 'urlEncoder',
} as const;

export type DefaultLookupName = keyof typeof DefaultLookupPrefixes;
