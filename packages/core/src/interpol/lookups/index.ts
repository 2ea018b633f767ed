export { FunctionLookup, MapLookup } from './function-lookup.js';
export { EnvironmentLookup } from './environment-lookup.js';
export {
  SystemProperties,
  SystemPropertiesLookup,
} from './system-properties.js';
export { ConstantLookup, type ConstantLookupOptions } from './constant-lookup.js';
export {
  LocalHostLookup,
  systemHostInfo,
  type HostInfo,
} from './local-host-lookup.js';
export {
  base64DecoderLookup,
  base64EncoderLookup,
  urlDecoderLookup,
  urlEncoderLookup,
} from './codec-lookups.js';
export { FileLookup } from './file-lookup.js';
export {
  ConfigurationLookup,
  type IRawPropertySource,
} from './configuration-lookup.js';
export {
  DEFAULT_PREFIX_LOOKUPS_ENV,
  createDefaultLookup,
  createDefaultPrefixLookups,
  getDefaultPrefixLookups,
} from './default-lookups.js';
