import {
  DefaultLookupPrefixes,
  type DefaultLookupName,
  type ILookup,
} from '@cfgtree/models';
import { DefaultLookupSelectionSchema } from '@cfgtree/schemas';
import {
  base64DecoderLookup,
  base64EncoderLookup,
  urlDecoderLookup,
  urlEncoderLookup,
} from './codec-lookups.js';
import { ConstantLookup } from './constant-lookup.js';
import { EnvironmentLookup } from './environment-lookup.js';
import { FileLookup } from './file-lookup.js';
import { LocalHostLookup } from './local-host-lookup.js';
import { SystemPropertiesLookup } from './system-properties.js';

/**
 * Environment variable narrowing the default prefix lookups, e.g.
 * `CFGTREE_DEFAULT_PREFIX_LOOKUPS="SYSTEM_PROPERTIES, ENVIRONMENT"`.
 * @public
 */
export const DEFAULT_PREFIX_LOOKUPS_ENV = 'CFGTREE_DEFAULT_PREFIX_LOOKUPS';

const ALL_LOOKUP_NAMES = Object.keys(DefaultLookupPrefixes).filter(
  isDefaultLookupName,
);

function isDefaultLookupName(name: string): name is DefaultLookupName {
  return Object.hasOwn(DefaultLookupPrefixes, name);
}

/**
 * Returns the built-in lookup for a name. Stateless lookups are shared,
 * stateful ones are created anew.
 * @public
 */
export function createDefaultLookup(name: DefaultLookupName): ILookup {
  switch (name) {
    case 'BASE64_DECODER':
      return base64DecoderLookup;
    case 'BASE64_ENCODER':
      return base64EncoderLookup;
    case 'CONST':
      return new ConstantLookup();
    case 'ENVIRONMENT':
      return new EnvironmentLookup();
    case 'FILE':
      return new FileLookup();
    case 'LOCAL_HOST':
      return new LocalHostLookup();
    case 'SYSTEM_PROPERTIES':
      return new SystemPropertiesLookup();
    case 'URL_DECODER':
      return urlDecoderLookup;
    case 'URL_ENCODER':
      return urlEncoderLookup;
  }
}

/**
 * Builds the prefix table of the selected built-in lookups. Without a
 * selection in the environment all built-in lookups are included.
 * @throws \{ZodError\} When the environment names an unknown lookup
 * @public
 */
export function createDefaultPrefixLookups(
  env: Record<string, string | undefined> = process.env,
): Map<string, ILookup> {
  const selection = env[DEFAULT_PREFIX_LOOKUPS_ENV];
  const names =
    selection === undefined
      ? ALL_LOOKUP_NAMES
      : DefaultLookupSelectionSchema.parse(selection);

  const lookups = new Map<string, ILookup>();
  for (const name of names) {
    lookups.set(DefaultLookupPrefixes[name], createDefaultLookup(name));
  }
  return lookups;
}

let defaultPrefixLookups: ReadonlyMap<string, ILookup> | undefined;

/**
 * The process-wide default prefix table, created on first use.
 * @public
 */
export function getDefaultPrefixLookups(): ReadonlyMap<string, ILookup> {
  defaultPrefixLookups ??= createDefaultPrefixLookups();
  return defaultPrefixLookups;
}
