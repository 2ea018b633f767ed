export * from './types/index.js';

export { ConfigurationEventType } from './enums/events.js';
export { DefaultLookupPrefixes } from './enums/lookups.js';
export type { DefaultLookupName } from './enums/lookups.js';
